/**
 * Terrain Oracle - read-only queries over a map's terrain grid.
 *
 * Both engines see terrain only through the TerrainOracle interface, so a
 * host can back it with whatever map storage it has. GridTerrain is the
 * in-memory implementation over a row-major array of terrain kinds.
 *
 * @module spatial/terrain
 */

import { Coord } from '../../schema/base-schemas.js';
import { CANOPY_TERRAIN, OPAQUE_TERRAIN, TerrainKind } from '../../schema/terrain.js';
import { GridShapeError } from '../../utils/errors.js';

export type Grid = ReadonlyArray<ReadonlyArray<TerrainKind>>;

export interface TerrainOracle {
    isInBounds(coord: Coord): boolean;
    /** Terrain at a cell, or undefined outside the grid */
    terrainAt(coord: Coord): TerrainKind | undefined;
    isFullyOpaque(terrain: TerrainKind): boolean;
    isCanopy(terrain: TerrainKind): boolean;
}

export class GridTerrain implements TerrainOracle {
    readonly rows: number;
    readonly cols: number;

    /**
     * @throws GridShapeError if the grid is empty or its rows differ in length
     */
    constructor(private readonly grid: Grid) {
        if (grid.length === 0 || grid[0].length === 0) {
            throw new GridShapeError('Terrain grid must have at least one cell');
        }

        this.rows = grid.length;
        this.cols = grid[0].length;

        for (let r = 1; r < grid.length; r++) {
            if (grid[r].length !== this.cols) {
                throw new GridShapeError('Terrain grid rows must all be the same width', r, this.cols, grid[r].length);
            }
        }
    }

    /**
     * Build a grid of one terrain kind, handy for tests and scratch maps.
     */
    static filled(rows: number, cols: number, terrain: TerrainKind): GridTerrain {
        return new GridTerrain(Array.from({ length: rows }, () => new Array<TerrainKind>(cols).fill(terrain)));
    }

    isInBounds(coord: Coord): boolean {
        return Number.isInteger(coord.row) && Number.isInteger(coord.col)
            && coord.row >= 0 && coord.col >= 0
            && coord.row < this.rows && coord.col < this.cols;
    }

    terrainAt(coord: Coord): TerrainKind | undefined {
        if (!this.isInBounds(coord)) return undefined;
        return this.grid[coord.row][coord.col];
    }

    isFullyOpaque(terrain: TerrainKind): boolean {
        return OPAQUE_TERRAIN.has(terrain);
    }

    isCanopy(terrain: TerrainKind): boolean {
        return CANOPY_TERRAIN.has(terrain);
    }
}
