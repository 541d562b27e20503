/**
 * Visibility Scanner - one viewer's field of view, resolved for drawing.
 *
 * A pure function of its inputs: beamcast the lit cells, then resolve what
 * each lit cell shows. Nothing carries over between calls; the caller
 * threads the radius profile (from its clock) and the fog cells through.
 *
 * @module visibility/scanner
 */

import { Coord, CoordSchema, Viewport, ViewportSchema } from '../../schema/base-schemas.js';
import { SpatialConfig } from '../../schema/config.js';
import { DEFAULT_SPATIAL_CONFIG } from '../../utils/config.js';
import { createLogger, createTimer } from '../../utils/logger.js';
import { TerrainOracle } from '../spatial/terrain.js';
import { castVisibility } from './beamcast.js';
import { buildNoFogZone } from './no-fog-zone.js';
import { RadiusProfile } from './radius-profile.js';
import { RenderBuffer, RenderCell, resolveRender } from './render.js';
import { EMPTY_SCENE, SceneView } from './scene.js';

const log = createLogger('Scanner');

export interface VisibilityQuery {
    viewer: Coord;
    terrain: TerrainOracle;
    profile: RadiusProfile;
    /** Weather overlay, coordKey() strings. Defaults to no fog. */
    fogCells?: ReadonlySet<string>;
    /** Cells where fog is ignored. Defaults to the viewer's 8-cell halo. */
    noFogZone?: ReadonlySet<string>;
    /** Creatures, vessels and items to draw. Defaults to an empty scene. */
    scene?: SceneView;
    /** Overrides the configured viewport for this call */
    viewport?: Viewport;
}

export type ScannerOptions = Pick<SpatialConfig, 'canopyAttenuation' | 'viewport'>;

const NO_FOG: ReadonlySet<string> = new Set<string>();

/**
 * Compute what a viewer sees this redraw.
 *
 * Never throws. A malformed viewer yields a buffer with only the viewer drawn
 * at the centre; a malformed viewport falls back to the configured one.
 *
 * @example
 * ```typescript
 * const profiles = new RadiusProfileTable(config);
 * const buffer = computeVisibility({
 *     viewer: player,
 *     terrain,
 *     profile: profiles.select(clock),
 *     fogCells,
 *     noFogZone: buildNoFogZone(player, { lightSourceActive: clock.lightSourceActive }),
 *     scene: createSceneView(occupancy, items),
 * });
 * ```
 */
export function computeVisibility(
    query: VisibilityQuery,
    options: Partial<ScannerOptions> = {}
): RenderBuffer {
    const viewport = resolveViewport(query.viewport, options.viewport);
    const viewerCheck = CoordSchema.safeParse(query.viewer);
    if (!viewerCheck.success) {
        log.warn(`Rejected malformed viewer ${JSON.stringify(query.viewer)}`);
        return viewerOnlyBuffer(viewport);
    }

    const viewer = viewerCheck.data;
    const fogCells = query.fogCells ?? NO_FOG;
    const timer = createTimer(log);

    const visibility = castVisibility({
        viewer,
        terrain: query.terrain,
        profile: query.profile,
        viewport,
        fogCells,
        noFogZone: query.noFogZone ?? buildNoFogZone(viewer),
        canopyAttenuation: options.canopyAttenuation ?? DEFAULT_SPATIAL_CONFIG.canopyAttenuation,
    });

    const buffer = resolveRender({
        visibility,
        viewer,
        terrain: query.terrain,
        scene: query.scene ?? EMPTY_SCENE,
        fogCells,
    });

    timer.done(`Scanned ${query.profile.name} from ${viewer.row},${viewer.col}: ${buffer.seen.length} cells lit`);
    return buffer;
}

function resolveViewport(requested: Viewport | undefined, configured: Viewport | undefined): Viewport {
    const fallback = configured ?? DEFAULT_SPATIAL_CONFIG.viewport;
    if (requested === undefined) return fallback;

    const parsed = ViewportSchema.safeParse(requested);
    if (!parsed.success) {
        log.warn(`Rejected viewport ${JSON.stringify(requested)}, using ${fallback.height}x${fallback.width}`);
        return fallback;
    }
    return parsed.data;
}

function viewerOnlyBuffer(viewport: Viewport): RenderBuffer {
    const cells: RenderCell[] = new Array<RenderCell>(viewport.height * viewport.width).fill({ kind: 'unseen' });
    const center = Math.floor(viewport.height / 2) * viewport.width + Math.floor(viewport.width / 2);
    cells[center] = { kind: 'viewer', terrain: undefined, stance: 'standing' };
    return {
        viewport: { ...viewport },
        origin: { row: 0, col: 0 },
        cells,
        seen: [],
    };
}
