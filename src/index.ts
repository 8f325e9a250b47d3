export type { EastNorth } from './geo/Coordinates';
export { gridRefString } from './geo/Coordinates';
export type { GridRefResult } from './geo/GridRef';
export { GRID_LETTERS, MAX_EASTING, MAX_NORTHING, formatGridRef, gridLetterPair, tryFormatGridRef } from './geo/GridRef';
export type { GridRefErrorCode } from './geo/GridRefError';
export { GridRefError, isGridRefError } from './geo/GridRefError';
export type { GridRefOptions, ResolvedGridRefOptions } from './geo/GridRefOptions';
export {
    DEFAULT_GRID_REF_OPTIONS, GRID_REF_PRECISIONS, gridRefResolution, resolveOptions, validateMaxFigs,
} from './geo/GridRefOptions';
