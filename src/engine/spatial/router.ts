/**
 * Router - A* pathfinding over the terrain grid.
 *
 * - 8-directional movement, uniform step cost 1
 * - Passability decided per call by the querent's passability set
 * - Live occupancy consulted lazily, the search target always enterable
 * - Unstandable goals replaced by the nearest reachable cell (bounded flood fill)
 *
 * Routing never throws. "No route" is an empty path and bad coordinates are
 * treated as unroutable, so one bad decision cannot stall a turn.
 *
 * @module spatial/router
 */

import seedrandom from 'seedrandom';
import { Coord, CoordSchema } from '../../schema/base-schemas.js';
import { Heuristic, SpatialConfig, SpatialConfigSchema } from '../../schema/config.js';
import { DEFAULT_SPATIAL_CONFIG } from '../../utils/config.js';
import { createLogger, createTimer } from '../../utils/logger.js';
import {
    chebyshevDistance,
    coordKey,
    coordsEqual,
    euclideanDistance,
    manhattanDistance,
    neighbors8,
    squaredDistance
} from './geometry.js';
import { MinHeap } from './heap.js';
import { NO_OCCUPANTS, OccupancyOracle } from './occupancy.js';
import { isPassableBy, PassabilitySet } from './passability.js';
import { TerrainOracle } from './terrain.js';

const log = createLogger('Router');

export type RouterOptions = Pick<SpatialConfig, 'floodFillRadius' | 'heuristic'>;

interface SearchNode {
    coord: Coord;
    parent: Coord | null;
    g: number;
    h: number;
    f: number;
}

const HEURISTICS: Record<Heuristic, (a: Coord, b: Coord) => number> = {
    manhattan: manhattanDistance,
    euclidean: euclideanDistance,
    chebyshev: chebyshevDistance,
};

const RouterOptionsSchema = SpatialConfigSchema.pick({ floodFillRadius: true, heuristic: true }).partial();

/**
 * Options out of range fall back to the defaults as a whole.
 */
function resolveRouterOptions(options: Partial<RouterOptions>): RouterOptions {
    const parsed = RouterOptionsSchema.safeParse(options);
    if (!parsed.success) {
        log.warn(`Rejected router options ${JSON.stringify(options)}, using defaults`);
        return {
            floodFillRadius: DEFAULT_SPATIAL_CONFIG.floodFillRadius,
            heuristic: DEFAULT_SPATIAL_CONFIG.heuristic,
        };
    }
    return {
        floodFillRadius: parsed.data.floodFillRadius ?? DEFAULT_SPATIAL_CONFIG.floodFillRadius,
        heuristic: parsed.data.heuristic ?? DEFAULT_SPATIAL_CONFIG.heuristic,
    };
}

export class Router {
    private readonly options: RouterOptions;
    private readonly estimate: (a: Coord, b: Coord) => number;

    constructor(
        private readonly terrain: TerrainOracle,
        options: Partial<RouterOptions> = {}
    ) {
        this.options = resolveRouterOptions(options);
        this.estimate = HEURISTICS[this.options.heuristic];
    }

    /**
     * Best-effort path from `start` to `goal`, both inclusive.
     *
     * @returns 8-adjacent cells from start to goal (or to a substitute goal when
     * the goal's terrain is outside `passability`); `[start]` when start equals
     * goal; `[]` when nothing is reachable
     *
     * @example
     * ```typescript
     * const router = new Router(terrain);
     * const path = router.findPath(shark, player, SWIMMER_TERRAIN, occupancy.view('shark-1'));
     * const next = path[1]; // undefined: stay put
     * ```
     */
    findPath(
        start: Coord,
        goal: Coord,
        passability: PassabilitySet,
        occupancy: OccupancyOracle = NO_OCCUPANTS
    ): Coord[] {
        const startCheck = CoordSchema.safeParse(start);
        const goalCheck = CoordSchema.safeParse(goal);
        if (!startCheck.success || !goalCheck.success) {
            log.warn(`Rejected malformed path request ${JSON.stringify({ start, goal })}`);
            return [];
        }

        const from = startCheck.data;
        let to = goalCheck.data;

        if (!this.terrain.isInBounds(from) || !this.terrain.isInBounds(to)) {
            log.debug(`Path endpoint out of bounds: ${coordKey(from)} -> ${coordKey(to)}`);
            return [];
        }

        if (coordsEqual(from, to)) {
            return [from];
        }

        if (!isPassableBy(this.terrain.terrainAt(to), passability)) {
            const substitute = this.findSubstituteGoal(from, to, passability, occupancy);
            if (!substitute) {
                log.debug(`No substitute for unstandable goal ${coordKey(to)} from ${coordKey(from)}`);
                return [];
            }
            if (coordsEqual(substitute, from)) {
                return [from];
            }
            log.debug(`Goal ${coordKey(to)} unstandable, routing to ${coordKey(substitute)} instead`);
            to = substitute;
        }

        return this.search(from, to, passability, occupancy);
    }

    /**
     * Reachable cells around `start`, breadth-first, within the flood-fill
     * radius. Start is the first entry.
     */
    reachableFrom(start: Coord, passability: PassabilitySet, occupancy: OccupancyOracle = NO_OCCUPANTS): Coord[] {
        const limit = this.options.floodFillRadius * this.options.floodFillRadius;
        const visited = new Set<string>([coordKey(start)]);
        const order: Coord[] = [start];

        for (let i = 0; i < order.length; i++) {
            for (const next of neighbors8(order[i])) {
                const key = coordKey(next);
                if (visited.has(key)) continue;
                visited.add(key);

                if (squaredDistance(start, next) > limit) continue;
                if (!isPassableBy(this.terrain.terrainAt(next), passability)) continue;
                if (!occupancy.isCellFree(next)) continue;

                order.push(next);
            }
        }

        return order;
    }

    /**
     * Nearest reachable stand-in for an unstandable goal, or null when the
     * querent cannot move at all. Start competes with the other cells, so a
     * querent already as close as it can get stays put.
     */
    private findSubstituteGoal(
        start: Coord,
        goal: Coord,
        passability: PassabilitySet,
        occupancy: OccupancyOracle
    ): Coord | null {
        const reachable = this.reachableFrom(start, passability, occupancy);
        if (reachable.length <= 1) return null;

        // Discovery order doubles as the tie-break
        const candidates = new MinHeap<Coord>(coordKey);
        for (const coord of reachable) {
            candidates.insert(coord, squaredDistance(coord, goal));
        }
        return candidates.extractMin();
    }

    private search(
        start: Coord,
        goal: Coord,
        passability: PassabilitySet,
        occupancy: OccupancyOracle
    ): Coord[] {
        const timer = createTimer(log);
        const goalKey = coordKey(goal);
        const nodes = new Map<string, SearchNode>();
        const closed = new Set<string>();
        const open = new MinHeap<Coord>(coordKey);

        const h = this.estimate(start, goal);
        nodes.set(coordKey(start), { coord: start, parent: null, g: 0, h, f: h });
        open.insert(start, h);

        let current = open.extractMin();
        while (current !== null) {
            const currentKey = coordKey(current);

            if (currentKey === goalKey) {
                const path = this.backtrace(nodes, goalKey);
                timer.done(`Path ${coordKey(start)} -> ${goalKey}: ${path.length} cells, ${closed.size} expanded`);
                return path;
            }

            closed.add(currentKey);
            const currentNode = nodes.get(currentKey);
            const g = (currentNode?.g ?? 0) + 1;

            for (const next of neighbors8(current)) {
                const nextKey = coordKey(next);
                if (closed.has(nextKey)) continue;
                if (!this.terrain.isInBounds(next)) continue;
                if (!isPassableBy(this.terrain.terrainAt(next), passability)) continue;
                if (nextKey !== goalKey && !occupancy.isCellFree(next)) continue;

                const known = nodes.get(nextKey);
                if (known && g >= known.g) continue;

                const nextH = known?.h ?? this.estimate(next, goal);
                nodes.set(nextKey, { coord: next, parent: current, g, h: nextH, f: g + nextH });
                open.insert(next, g + nextH);
            }

            current = open.extractMin();
        }

        timer.done(`No path ${coordKey(start)} -> ${goalKey}, ${closed.size} expanded`);
        return [];
    }

    private backtrace(nodes: Map<string, SearchNode>, goalKey: string): Coord[] {
        const path: Coord[] = [];
        let node = nodes.get(goalKey);
        while (node) {
            path.push(node.coord);
            node = node.parent ? nodes.get(coordKey(node.parent)) : undefined;
        }
        return path.reverse();
    }

    /**
     * A random free, passable neighbour of `origin`, or `origin` itself when
     * boxed in. For callers whose path came back empty or too short.
     *
     * @param random seeded generator; defaults to one seeded from the origin
     */
    findAdjacentOpenCell(
        origin: Coord,
        passability: PassabilitySet,
        occupancy: OccupancyOracle = NO_OCCUPANTS,
        random: () => number = seedrandom(coordKey(origin))
    ): Coord {
        const open = neighbors8(origin).filter(next =>
            this.terrain.isInBounds(next)
            && isPassableBy(this.terrain.terrainAt(next), passability)
            && occupancy.isCellFree(next)
        );

        if (open.length === 0) {
            return { row: origin.row, col: origin.col };
        }
        return open[Math.floor(random() * open.length)];
    }
}

/**
 * One-shot form of Router.findPath for callers without a long-lived router.
 */
export function findPath(
    terrain: TerrainOracle,
    start: Coord,
    goal: Coord,
    passability: PassabilitySet,
    occupancy: OccupancyOracle = NO_OCCUPANTS,
    options: Partial<RouterOptions> = {}
): Coord[] {
    return new Router(terrain, options).findPath(start, goal, passability, occupancy);
}
