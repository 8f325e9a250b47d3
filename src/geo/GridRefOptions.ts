import { GridRefError } from './GridRefError';

export interface GridRefOptions {
    /** total figures for easting & northing combined, even number 0..10 */
    maxFigs?: number;
    /** drop trailing zeros (evenly from easting & northing) for variable precision */
    varFigs?: boolean;
    /** 'TQ 321 813' rather than 'TQ321813' */
    includeSpaces?: boolean;
}

export type ResolvedGridRefOptions = Required<GridRefOptions>;

export const DEFAULT_GRID_REF_OPTIONS: Readonly<ResolvedGridRefOptions> = Object.freeze({
    maxFigs: 6,
    varFigs: false,
    includeSpaces: false,
});

/** size of the square (in metres) that a reference with this many figures identifies */
export const GRID_REF_PRECISIONS: Readonly<Record<number, number>> = Object.freeze({
    0: 100000,
    2: 10000,
    4: 1000,
    6: 100,
    8: 10,
    10: 1,
});

export function validateMaxFigs(maxFigs: number) {
    if (!Number.isInteger(maxFigs) || maxFigs % 2 !== 0 || maxFigs < 0 || maxFigs > 10) {
        throw new GridRefError('InvalidArgument', `max_figs must be an even number between 0 and 10 (got ${maxFigs})`);
    }
}

export function resolveOptions(options: GridRefOptions = {}): ResolvedGridRefOptions {
    const resolved = {
        maxFigs: options.maxFigs ?? DEFAULT_GRID_REF_OPTIONS.maxFigs,
        varFigs: options.varFigs ?? DEFAULT_GRID_REF_OPTIONS.varFigs,
        includeSpaces: options.includeSpaces ?? DEFAULT_GRID_REF_OPTIONS.includeSpaces,
    };
    validateMaxFigs(resolved.maxFigs);
    return resolved;
}

export function gridRefResolution(maxFigs: number) {
    validateMaxFigs(maxFigs);
    return GRID_REF_PRECISIONS[maxFigs];
}
