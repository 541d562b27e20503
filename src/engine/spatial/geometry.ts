/**
 * Grid geometry helpers shared by the router, the scanner and weather.
 *
 * Coordinate sets throughout the engine are `Set<string>` keyed by
 * `coordKey()`, i.e. "row,col".
 *
 * @module spatial/geometry
 */

import { Coord, Offset } from '../../schema/base-schemas.js';

export function coordKey(coord: Coord): string {
    return `${coord.row},${coord.col}`;
}

export function coordsEqual(a: Coord, b: Coord): boolean {
    return a.row === b.row && a.col === b.col;
}

export function offsetCoord(origin: Coord, offset: Offset): Coord {
    return { row: origin.row + offset.dr, col: origin.col + offset.dc };
}

/**
 * The 8 neighbour offsets, row-major from north-west to south-east.
 * Expansion order in the router follows this order.
 */
export const NEIGHBORS_8: readonly Offset[] = [
    { dr: -1, dc: -1 }, // NW
    { dr: -1, dc: 0 },  // N
    { dr: -1, dc: 1 },  // NE
    { dr: 0, dc: -1 },  // W
    { dr: 0, dc: 1 },   // E
    { dr: 1, dc: -1 },  // SW
    { dr: 1, dc: 0 },   // S
    { dr: 1, dc: 1 },   // SE
];

export function neighbors8(coord: Coord): Coord[] {
    return NEIGHBORS_8.map(offset => offsetCoord(coord, offset));
}

/**
 * True when two distinct cells touch orthogonally or diagonally.
 */
export function isAdjacent(a: Coord, b: Coord): boolean {
    if (coordsEqual(a, b)) return false;
    return Math.abs(a.row - b.row) <= 1 && Math.abs(a.col - b.col) <= 1;
}

// ============================================================
// DISTANCES
// ============================================================

export function manhattanDistance(a: Coord, b: Coord): number {
    return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function chebyshevDistance(a: Coord, b: Coord): number {
    return Math.max(Math.abs(a.row - b.row), Math.abs(a.col - b.col));
}

export function squaredDistance(a: Coord, b: Coord): number {
    const dr = a.row - b.row;
    const dc = a.col - b.col;
    return dr * dr + dc * dc;
}

export function euclideanDistance(a: Coord, b: Coord): number {
    return Math.sqrt(squaredDistance(a, b));
}

// ============================================================
// LINES
// ============================================================

/**
 * Cells on the Bresenham line from `from` to `to`, both inclusive.
 *
 * Steps along the major axis; the minor axis advances once the accumulated
 * error exceeds floor(majorDelta / 2). The scanner walks rays with the same
 * stepping so both agree cell for cell.
 *
 * @example
 * ```typescript
 * bresenhamLine({ row: 0, col: 0 }, { row: 1, col: 3 });
 * // [(0,0), (0,1), (1,2), (1,3)]
 * ```
 */
export function bresenhamLine(from: Coord, to: Coord): Coord[] {
    const cells: Coord[] = [];
    const walker = new BresenhamWalker(from, to);
    cells.push(walker.current());
    while (walker.stepsTaken() < walker.majorLength()) {
        cells.push(walker.step());
    }
    return cells;
}

/**
 * Incremental Bresenham stepper. Callers decide when to stop, which is what
 * lets a sight line end early or be shortened mid-flight.
 */
export class BresenhamWalker {
    private row: number;
    private col: number;
    private readonly rowStep: number;
    private readonly colStep: number;
    private readonly deltaRow: number;
    private readonly deltaCol: number;
    private readonly rowMajor: boolean;
    private readonly criterion: number;
    private error = 0;
    private steps = 0;

    constructor(from: Coord, to: Coord) {
        this.row = from.row;
        this.col = from.col;
        this.rowStep = to.row >= from.row ? 1 : -1;
        this.colStep = to.col >= from.col ? 1 : -1;
        this.deltaRow = Math.abs(to.row - from.row);
        this.deltaCol = Math.abs(to.col - from.col);
        this.rowMajor = this.deltaCol <= this.deltaRow;
        this.criterion = Math.floor((this.rowMajor ? this.deltaRow : this.deltaCol) / 2);
    }

    /** Number of steps along the major axis from start to end */
    majorLength(): number {
        return this.rowMajor ? this.deltaRow : this.deltaCol;
    }

    stepsTaken(): number {
        return this.steps;
    }

    current(): Coord {
        return { row: this.row, col: this.col };
    }

    step(): Coord {
        if (this.rowMajor) {
            this.row += this.rowStep;
            this.error += this.deltaCol;
            if (this.error > this.criterion) {
                this.error -= this.deltaRow;
                this.col += this.colStep;
            }
        } else {
            this.col += this.colStep;
            this.error += this.deltaRow;
            if (this.error > this.criterion) {
                this.error -= this.deltaCol;
                this.row += this.rowStep;
            }
        }
        this.steps++;
        return this.current();
    }
}

// ============================================================
// CIRCLES
// ============================================================

/**
 * Offsets on the midpoint (Bresenham) circle of the given radius, without
 * duplicates, in a stable order. Radius 0 is the origin alone.
 */
export function circleOffsets(radius: number): Offset[] {
    if (radius <= 0) return [{ dr: 0, dc: 0 }];

    const seen = new Set<string>();
    const offsets: Offset[] = [];
    const add = (dr: number, dc: number): void => {
        const key = `${dr},${dc}`;
        if (seen.has(key)) return;
        seen.add(key);
        // + 0 turns -0 into 0
        offsets.push({ dr: dr + 0, dc: dc + 0 });
    };

    let x = radius;
    let y = 0;
    let decision = 1 - radius;

    while (y <= x) {
        add(-y, x);
        add(-x, y);
        add(-x, -y);
        add(-y, -x);
        add(y, -x);
        add(x, -y);
        add(x, y);
        add(y, x);

        y++;
        if (decision < 0) {
            decision += 2 * y + 1;
        } else {
            x--;
            decision += 2 * (y - x) + 1;
        }
    }

    return offsets;
}

/**
 * Cells on the midpoint circle around `center`. No bounds check.
 */
export function bresenhamCircle(center: Coord, radius: number): Coord[] {
    return circleOffsets(radius).map(offset => offsetCoord(center, offset));
}

/**
 * Offsets of the filled disc of the given radius: every offset with
 * dr² + dc² <= r² + r, which rasterizes without gaps against the ring.
 */
export function discOffsets(radius: number): Offset[] {
    const offsets: Offset[] = [];
    const limit = radius * radius + radius;
    for (let dr = -radius; dr <= radius; dr++) {
        for (let dc = -radius; dc <= radius; dc++) {
            if (dr * dr + dc * dc <= limit) {
                offsets.push({ dr, dc });
            }
        }
    }
    return offsets;
}
