import { GridRefError } from './GridRefError';
import { GridRefOptions, resolveOptions } from './GridRefOptions';

/** grid letters, A-Z with 'I' omitted */
export const GRID_LETTERS = 'ABCDEFGHJKLMNOPQRSTUVWXYZ';

// extent accepted for BNG eastings / northings (metres)
export const MAX_EASTING = 700000;
export const MAX_NORTHING = 1300000;

export type GridRefResult =
    | { ok: true; gridRef: string }
    | { ok: false; error: GridRefError };

function checkExtent(e: number, n: number) {
    if (!Number.isFinite(e) || !Number.isFinite(n)) {
        throw new GridRefError('OutOfRange', `coordinate is not finite (${e}, ${n})`);
    }
    if (e < 0 || e > MAX_EASTING || n < 0 || n > MAX_NORTHING) {
        throw new GridRefError('OutOfRange', `coordinate (${e}, ${n}) is outside the British National Grid`);
    }
}

/**
 * Two-letter code of the 100km square containing (e, n).
 * First letter picks the 500km square, second the 100km square within it.
 */
export function gridLetterPair(e: number, n: number) {
    checkExtent(e, n);
    // get the 100km-grid indices
    const e100k = Math.floor(e / 100000);
    const n100k = Math.floor(n / 100000);

    // indices into GRID_LETTERS, which has no 'I' to skip
    const l1 = (19 - n100k) - (19 - n100k) % 5 + Math.floor((e100k + 10) / 5);
    const l2 = (19 - n100k) * 5 % 25 + e100k % 5;

    return GRID_LETTERS.charAt(l1) + GRID_LETTERS.charAt(l2);
}

/** drop the same number of trailing zeros from both digit groups */
function trimTrailingZeros(eChars: string, nChars: string): [string, string] {
    const zeros = (s: string) => s.length - s.replace(/0+$/, '').length;
    const nZeros = Math.min(zeros(eChars), zeros(nChars));
    if (nZeros === 0) return [eChars, nChars];
    return [eChars.slice(0, -nZeros), nChars.slice(0, -nZeros)];
}

/**
 * Format a British National Grid (EPSG:27700) easting / northing as an Ordnance Survey
 * grid reference, eg `formatGridRef(532100, 181300)` -> 'TQ321813'.
 *
 * Digits are truncated, not rounded: a reference names the square the point is in.
 *
 * @throws {GridRefError} `InvalidArgument` if maxFigs isn't an even number in 0..10,
 * `OutOfRange` if the point isn't on the grid.
 */
export function formatGridRef(e: number, n: number, options?: GridRefOptions): string;
export function formatGridRef(e: number, n: number, maxFigs?: number, varFigs?: boolean, includeSpaces?: boolean): string;
export function formatGridRef(e: number, n: number, optionsOrMaxFigs?: GridRefOptions | number, varFigs?: boolean, includeSpaces?: boolean) {
    const options = typeof optionsOrMaxFigs === 'object'
        ? resolveOptions(optionsOrMaxFigs)
        : resolveOptions({ maxFigs: optionsOrMaxFigs, varFigs, includeSpaces });
    const letterPair = gridLetterPair(e, n);

    // strip 100km-grid indices
    const eRes = Math.floor(e % 100000);
    const nRes = Math.floor(n % 100000);

    const figs = options.maxFigs / 2;
    let eChars = eRes.toString().padStart(5, '0').slice(0, figs);
    let nChars = nRes.toString().padStart(5, '0').slice(0, figs);

    if (options.varFigs) [eChars, nChars] = trimTrailingZeros(eChars, nChars);

    if (options.includeSpaces) return `${letterPair} ${eChars} ${nChars}`.trim();
    return letterPair + eChars + nChars;
}

/** as formatGridRef, but reports a GridRefError as a value rather than throwing it */
export function tryFormatGridRef(e: number, n: number, options?: GridRefOptions): GridRefResult {
    try {
        return { ok: true, gridRef: formatGridRef(e, n, options) };
    } catch (error) {
        if (error instanceof GridRefError) return { ok: false, error };
        throw error;
    }
}
