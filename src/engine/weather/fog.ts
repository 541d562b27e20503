/**
 * Fog - the weather overlay the scanner treats as a sight blocker.
 *
 * Each weather system is a fog bank around a centre cell. Every ring from
 * radius 1 outward is walked and each in-bounds ring point turns to fog
 * with the system's intensity as probability. Rolls come from a seeded
 * generator so the same seed and systems give the same fog.
 */

import seedrandom from 'seedrandom';
import { WeatherSystem, WeatherSystemSchema } from '../../schema/weather.js';
import { createLogger } from '../../utils/logger.js';
import { bresenhamCircle, coordKey } from '../spatial/geometry.js';
import { TerrainOracle } from '../spatial/terrain.js';

const log = createLogger('Weather');

export class FogGenerator {
    private rng: seedrandom.PRNG;

    constructor(seed: string) {
        this.rng = seedrandom(seed);
    }

    /**
     * Fog cells for this turn, as coordKey() strings. Invalid systems are
     * skipped with a warning.
     */
    generate(systems: readonly WeatherSystem[], terrain: TerrainOracle): Set<string> {
        const fog = new Set<string>();

        for (const system of systems) {
            const parsed = WeatherSystemSchema.safeParse(system);
            if (!parsed.success) {
                log.warn(`Skipping invalid weather system ${JSON.stringify(system)}`);
                continue;
            }

            const { row, col, radius, intensity } = parsed.data;
            for (let r = 1; r <= radius; r++) {
                for (const point of bresenhamCircle({ row, col }, r)) {
                    const roll = this.rng();
                    if (roll < intensity && terrain.isInBounds(point)) {
                        fog.add(coordKey(point));
                    }
                }
            }
        }

        log.debug(`Generated ${fog.size} fog cells from ${systems.length} systems`);
        return fog;
    }
}

/**
 * One-shot fog generation with a fresh generator.
 */
export function generateFogCells(
    systems: readonly WeatherSystem[],
    terrain: TerrainOracle,
    seed: string
): Set<string> {
    return new FogGenerator(seed).generate(systems, terrain);
}
