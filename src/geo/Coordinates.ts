import { formatGridRef } from './GridRef';
import { GridRefOptions, resolveOptions } from './GridRefOptions';

/** British National Grid (EPSG:27700), metres */
export interface EastNorth {
    east: number;
    north: number;
}

/**
 * Grid reference for a point that's already been projected to BNG (eg a centroid).
 * Returns undefined when there's no point to give a reference for; bad options throw either way.
 */
export function gridRefString(coord: EastNorth | null | undefined, options?: GridRefOptions) {
    const resolved = resolveOptions(options);
    if (!coord) return undefined;
    if (!Number.isFinite(coord.east) || !Number.isFinite(coord.north)) {
        console.warn(`gridRefString() : ignoring non-finite coordinate (${coord.east}, ${coord.north})`);
        return undefined;
    }
    //truncate toward zero, as a cast to int would.
    return formatGridRef(Math.trunc(coord.east), Math.trunc(coord.north), resolved);
}
