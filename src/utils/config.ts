/**
 * Spatial configuration loading.
 *
 * Layers, lowest to highest precedence:
 *   1. schema defaults
 *   2. TIDEWATCH_* environment variables
 *   3. explicit overrides passed by the caller
 *
 * Environment:
 *   TIDEWATCH_FLOOD_FILL_RADIUS, TIDEWATCH_HEURISTIC, TIDEWATCH_CANOPY_ATTENUATION,
 *   TIDEWATCH_VIEWPORT_HEIGHT, TIDEWATCH_VIEWPORT_WIDTH, TIDEWATCH_DUSK_RADIUS,
 *   TIDEWATCH_NIGHT_RADIUS, TIDEWATCH_LIGHT_RADIUS, TIDEWATCH_NO_FOG_HALO_RADIUS
 */

import { SpatialConfig, SpatialConfigInput, SpatialConfigSchema } from '../schema/config.js';
import { SpatialConfigError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('Config');

type Env = Record<string, string | undefined>;

const NUMERIC_ENV_KEYS = {
    floodFillRadius: 'TIDEWATCH_FLOOD_FILL_RADIUS',
    canopyAttenuation: 'TIDEWATCH_CANOPY_ATTENUATION',
    duskRadius: 'TIDEWATCH_DUSK_RADIUS',
    nightRadius: 'TIDEWATCH_NIGHT_RADIUS',
    lightRadius: 'TIDEWATCH_LIGHT_RADIUS',
    noFogHaloRadius: 'TIDEWATCH_NO_FOG_HALO_RADIUS',
} as const;

/**
 * Parse a numeric env var. Non-numeric text is passed through as NaN so the
 * schema rejects it with a field-specific message.
 */
function readNumber(env: Env, key: string): number | undefined {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return undefined;
    return Number(raw);
}

/**
 * Build a partial config from TIDEWATCH_* variables. Unset variables are omitted.
 */
export function readEnvConfig(env: Env = process.env): Record<string, unknown> {
    const fromEnv: Record<string, unknown> = {};

    for (const [field, key] of Object.entries(NUMERIC_ENV_KEYS)) {
        const value = readNumber(env, key);
        if (value !== undefined) {
            fromEnv[field] = value;
        }
    }

    const heuristic = env.TIDEWATCH_HEURISTIC?.trim().toLowerCase();
    if (heuristic) {
        fromEnv.heuristic = heuristic;
    }

    const height = readNumber(env, 'TIDEWATCH_VIEWPORT_HEIGHT');
    const width = readNumber(env, 'TIDEWATCH_VIEWPORT_WIDTH');
    if (height !== undefined || width !== undefined) {
        const defaults = SpatialConfigSchema.parse({}).viewport;
        fromEnv.viewport = {
            height: height ?? defaults.height,
            width: width ?? defaults.width,
        };
    }

    return fromEnv;
}

/**
 * Load and validate the spatial configuration.
 *
 * @throws SpatialConfigError when the environment or the overrides hold invalid values
 *
 * @example
 * ```typescript
 * const config = loadSpatialConfig({ floodFillRadius: 12 });
 * config.heuristic; // 'manhattan' unless TIDEWATCH_HEURISTIC says otherwise
 * ```
 */
export function loadSpatialConfig(
    overrides: SpatialConfigInput = {},
    env: Env = process.env
): SpatialConfig {
    const fromEnv = SpatialConfigSchema.partial().safeParse(readEnvConfig(env));
    if (!fromEnv.success) {
        throw SpatialConfigError.fromZod(fromEnv.error, 'environment');
    }

    const merged = SpatialConfigSchema.safeParse({ ...fromEnv.data, ...overrides });
    if (!merged.success) {
        throw SpatialConfigError.fromZod(merged.error, 'overrides');
    }

    log.debug(`Loaded config: ${JSON.stringify(merged.data)}`);
    return merged.data;
}

/**
 * Defaults only, ignoring the environment. Used when callers pass no config.
 */
export const DEFAULT_SPATIAL_CONFIG: SpatialConfig = SpatialConfigSchema.parse({});
