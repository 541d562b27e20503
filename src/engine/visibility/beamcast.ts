/**
 * Perimeter beamcasting - which viewport cells a viewer can see.
 *
 * One Bresenham ray per boundary offset of the radius profile, walked from
 * the viewer outward. Along each ray:
 *
 * 1. leaving the grid or the viewport ends the ray
 * 2. fog outside the no-fog zone ends the ray, unseen
 * 3. the cell is marked visible
 * 4. fully opaque terrain ends the ray (the blocker itself is seen)
 * 5. canopy shortens the rest of the ray by the attenuation
 *
 * The viewer's own cell is exempt from 2, 4 and 5. Rays overlap near the
 * viewer and can leave gaps far out; with a small fixed viewport that is
 * acceptable in exchange for canopy that thins sight rather than walls it.
 *
 * @module visibility/beamcast
 */

import { Coord, Viewport } from '../../schema/base-schemas.js';
import { BresenhamWalker, coordKey, offsetCoord } from '../spatial/geometry.js';
import { TerrainOracle } from '../spatial/terrain.js';
import { RadiusProfile } from './radius-profile.js';

/**
 * Boolean grid over the viewport, row-major, addressed by world coordinate.
 */
export class VisibilityBuffer {
    readonly cells: boolean[];
    /** World coordinate of viewport cell (0, 0) */
    readonly origin: Coord;

    constructor(readonly viewport: Viewport, viewer: Coord) {
        this.cells = new Array<boolean>(viewport.height * viewport.width).fill(false);
        this.origin = {
            row: viewer.row - Math.floor(viewport.height / 2),
            col: viewer.col - Math.floor(viewport.width / 2),
        };
    }

    /**
     * Row-major index of a world coordinate, or -1 outside the viewport.
     */
    indexOf(coord: Coord): number {
        const row = coord.row - this.origin.row;
        const col = coord.col - this.origin.col;
        if (row < 0 || col < 0 || row >= this.viewport.height || col >= this.viewport.width) {
            return -1;
        }
        return row * this.viewport.width + col;
    }

    toWorld(index: number): Coord {
        return {
            row: this.origin.row + Math.floor(index / this.viewport.width),
            col: this.origin.col + (index % this.viewport.width),
        };
    }

    contains(coord: Coord): boolean {
        return this.indexOf(coord) !== -1;
    }

    mark(coord: Coord): void {
        const index = this.indexOf(coord);
        if (index !== -1) {
            this.cells[index] = true;
        }
    }

    isVisible(coord: Coord): boolean {
        const index = this.indexOf(coord);
        return index !== -1 && this.cells[index];
    }

    visibleCount(): number {
        return this.cells.filter(Boolean).length;
    }

    /**
     * World coordinates of every lit cell, row-major.
     */
    visibleCoords(): Coord[] {
        const coords: Coord[] = [];
        this.cells.forEach((lit, index) => {
            if (lit) coords.push(this.toWorld(index));
        });
        return coords;
    }
}

export interface BeamcastInput {
    viewer: Coord;
    terrain: TerrainOracle;
    profile: RadiusProfile;
    viewport: Viewport;
    fogCells: ReadonlySet<string>;
    noFogZone: ReadonlySet<string>;
    canopyAttenuation: number;
}

export function castVisibility(input: BeamcastInput): VisibilityBuffer {
    const buffer = new VisibilityBuffer(input.viewport, input.viewer);
    buffer.mark(input.viewer);

    for (const offset of input.profile.boundary) {
        traceRay(buffer, input, offsetCoord(input.viewer, offset));
    }

    return buffer;
}

function traceRay(buffer: VisibilityBuffer, input: BeamcastInput, target: Coord): void {
    const { terrain, fogCells, noFogZone, canopyAttenuation } = input;
    const walker = new BresenhamWalker(input.viewer, target);
    let end = walker.majorLength();
    let cell = walker.current();

    while (true) {
        const atViewer = walker.stepsTaken() === 0;
        const kind = terrain.terrainAt(cell);
        if (kind === undefined || !buffer.contains(cell)) return;

        const key = coordKey(cell);
        if (!atViewer && fogCells.has(key) && !noFogZone.has(key)) return;

        buffer.mark(cell);

        if (!atViewer) {
            if (terrain.isFullyOpaque(kind)) return;
            if (terrain.isCanopy(kind)) end -= canopyAttenuation;
        }

        if (walker.stepsTaken() >= end) return;
        cell = walker.step();
    }
}
