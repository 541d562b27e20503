import { Coord } from '../../schema/base-schemas.js';
import { DEFAULT_SPATIAL_CONFIG } from '../../utils/config.js';
import { coordKey, discOffsets, NEIGHBORS_8, offsetCoord } from '../spatial/geometry.js';

export interface NoFogZoneOptions {
    lightSourceActive?: boolean;
    haloRadius?: number;
}

/**
 * Cells around a viewer where fog never blocks sight: the viewer and its
 * 8 neighbours, widened to a filled disc of `haloRadius` while a light
 * source is lit. Keys are coordKey() strings and are not bounds checked.
 */
export function buildNoFogZone(viewer: Coord, options: NoFogZoneOptions = {}): Set<string> {
    const zone = new Set<string>([coordKey(viewer)]);
    for (const offset of NEIGHBORS_8) {
        zone.add(coordKey(offsetCoord(viewer, offset)));
    }

    if (options.lightSourceActive) {
        const radius = options.haloRadius ?? DEFAULT_SPATIAL_CONFIG.noFogHaloRadius;
        for (const offset of discOffsets(radius)) {
            zone.add(coordKey(offsetCoord(viewer, offset)));
        }
    }

    return zone;
}
