/**
 * Render resolution - what to show in each lit viewport cell.
 *
 * Precedence on a lit cell, highest first:
 *   creature > vessel part > topmost non-hidden item > fog > terrain
 *
 * Vessels go down in their own pass after everything else so each of their
 * three cells is stamped independently, but a vessel part never covers a
 * creature. The viewer's own cell is drawn last, as the viewer.
 *
 * @module visibility/render
 */

import { Coord, Viewport } from '../../schema/base-schemas.js';
import { TerrainKind } from '../../schema/terrain.js';
import { coordKey } from '../spatial/geometry.js';
import { ItemView, topVisibleItem } from '../spatial/items.js';
import { CreatureView, VesselPartView } from '../spatial/occupancy.js';
import { TerrainOracle } from '../spatial/terrain.js';
import { VisibilityBuffer } from './beamcast.js';
import { SceneView } from './scene.js';

export type ViewerStance = 'standing' | 'swimming' | 'aboard';

export type RenderCell =
    | { kind: 'unseen' }
    | { kind: 'terrain'; terrain: TerrainKind }
    | { kind: 'fog'; terrain: TerrainKind }
    | { kind: 'item'; terrain: TerrainKind; item: ItemView }
    | { kind: 'creature'; terrain: TerrainKind; creature: CreatureView }
    | { kind: 'vessel'; terrain: TerrainKind; part: VesselPartView }
    | { kind: 'viewer'; terrain: TerrainKind | undefined; stance: ViewerStance };

export interface RenderBuffer {
    viewport: Viewport;
    /** World coordinate of viewport cell (0, 0) */
    origin: Coord;
    /** Row-major, viewport.height * viewport.width entries */
    cells: RenderCell[];
    /** In-grid world coordinates lit this call, row-major */
    seen: Coord[];
}

const UNSEEN: RenderCell = { kind: 'unseen' };

export interface RenderInput {
    visibility: VisibilityBuffer;
    viewer: Coord;
    terrain: TerrainOracle;
    scene: SceneView;
    fogCells: ReadonlySet<string>;
}

export function resolveRender(input: RenderInput): RenderBuffer {
    const { visibility, viewer, terrain, scene, fogCells } = input;
    const cells: RenderCell[] = visibility.cells.map(() => UNSEEN);
    // The viewer may stand off the grid; only real cells are remembered
    const seen = visibility.visibleCoords().filter(coord => terrain.isInBounds(coord));

    for (const coord of seen) {
        const kind = terrain.terrainAt(coord);
        if (kind === undefined) continue;
        cells[visibility.indexOf(coord)] = resolveGround(coord, kind, scene, fogCells);
    }

    for (const coord of seen) {
        const part = scene.vesselPartAt(coord);
        const kind = terrain.terrainAt(coord);
        if (!part || kind === undefined) continue;

        const index = visibility.indexOf(coord);
        if (cells[index].kind === 'creature') continue;
        cells[index] = { kind: 'vessel', terrain: kind, part };
    }

    const viewerIndex = visibility.indexOf(viewer);
    if (viewerIndex !== -1) {
        cells[viewerIndex] = {
            kind: 'viewer',
            terrain: terrain.terrainAt(viewer),
            stance: viewerStance(viewer, terrain, scene),
        };
    }

    return {
        viewport: { ...visibility.viewport },
        origin: { ...visibility.origin },
        cells,
        seen,
    };
}

function resolveGround(coord: Coord, kind: TerrainKind, scene: SceneView, fogCells: ReadonlySet<string>): RenderCell {
    const creature = scene.creatureAt(coord);
    if (creature) {
        return { kind: 'creature', terrain: kind, creature };
    }

    const item = topVisibleItem(scene.itemsAt(coord));
    if (item) {
        return { kind: 'item', terrain: kind, item };
    }

    if (fogCells.has(coordKey(coord))) {
        return { kind: 'fog', terrain: kind };
    }

    return { kind: 'terrain', terrain: kind };
}

export function viewerStance(viewer: Coord, terrain: TerrainOracle, scene: SceneView): ViewerStance {
    if (scene.vesselPartAt(viewer)) return 'aboard';
    if (terrain.terrainAt(viewer) === 'deep_water') return 'swimming';
    return 'standing';
}

/**
 * Resolved cell at a world coordinate; unseen outside the viewport.
 */
export function renderCellAt(buffer: RenderBuffer, coord: Coord): RenderCell {
    const row = coord.row - buffer.origin.row;
    const col = coord.col - buffer.origin.col;
    if (row < 0 || col < 0 || row >= buffer.viewport.height || col >= buffer.viewport.width) {
        return UNSEEN;
    }
    return buffer.cells[row * buffer.viewport.width + col];
}
