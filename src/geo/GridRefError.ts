export type GridRefErrorCode = 'InvalidArgument' | 'OutOfRange';

/**
 * Thrown (or returned, from tryFormatGridRef) when a grid reference can't be made
 * from the given arguments.
 */
export class GridRefError extends RangeError {
    readonly code: GridRefErrorCode;
    constructor(code: GridRefErrorCode, message: string) {
        super(message);
        this.name = 'GridRefError';
        this.code = code;
    }
}

export function isGridRefError(e: unknown): e is GridRefError {
    return e instanceof GridRefError;
}
