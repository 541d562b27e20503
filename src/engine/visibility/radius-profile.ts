/**
 * Radius profiles - the boundary shapes sight lines are cast toward.
 *
 * A profile is a list of offsets from the viewer. In daylight it is the
 * whole viewport perimeter; at dusk and night it shrinks to a ring, and a
 * carried light widens the ring again.
 *
 * @module visibility/radius-profile
 */

import { Offset, Viewport } from '../../schema/base-schemas.js';
import { ClockStateInput, ClockStateSchema, DayPhase } from '../../schema/clock.js';
import { SpatialConfig } from '../../schema/config.js';
import { DEFAULT_SPATIAL_CONFIG } from '../../utils/config.js';
import { createLogger } from '../../utils/logger.js';
import { circleOffsets } from '../spatial/geometry.js';

const log = createLogger('Scanner').child('Profile');

export interface RadiusProfile {
    name: string;
    boundary: readonly Offset[];
}

/**
 * Every cell on the edge of a viewport, relative to the viewer at its centre.
 * Corners appear once.
 */
export function windowProfile(viewport: Viewport): RadiusProfile {
    const centerRow = Math.floor(viewport.height / 2);
    const centerCol = Math.floor(viewport.width / 2);
    const seen = new Set<string>();
    const boundary: Offset[] = [];

    const add = (row: number, col: number): void => {
        const key = `${row},${col}`;
        if (seen.has(key)) return;
        seen.add(key);
        boundary.push({ dr: row - centerRow, dc: col - centerCol });
    };

    for (let col = 0; col < viewport.width; col++) {
        add(0, col);
        add(viewport.height - 1, col);
    }
    for (let row = 0; row < viewport.height; row++) {
        add(row, 0);
        add(row, viewport.width - 1);
    }

    return { name: `window-${viewport.height}x${viewport.width}`, boundary };
}

/**
 * Midpoint circle of offsets at the given radius.
 */
export function ringProfile(radius: number): RadiusProfile {
    return { name: `ring-${radius}`, boundary: circleOffsets(radius) };
}

/**
 * Hours 7-18 are day, 5-6 and 19-20 dusk, everything else night.
 */
export function dayPhaseForHour(hour: number): DayPhase {
    if (hour >= 7 && hour <= 18) return 'day';
    if (hour === 5 || hour === 6 || hour === 19 || hour === 20) return 'dusk';
    return 'night';
}

export type ProfileTableConfig = Pick<SpatialConfig, 'viewport' | 'duskRadius' | 'nightRadius' | 'lightRadius'>;

/**
 * Precomputed profiles for each lighting condition, built once per viewport
 * and reused every redraw.
 */
export class RadiusProfileTable {
    readonly daylight: RadiusProfile;
    readonly dusk: RadiusProfile;
    readonly night: RadiusProfile;
    readonly lit: RadiusProfile;

    private readonly config: ProfileTableConfig;

    constructor(config: Partial<ProfileTableConfig> = {}) {
        this.config = {
            viewport: config.viewport ?? DEFAULT_SPATIAL_CONFIG.viewport,
            duskRadius: config.duskRadius ?? DEFAULT_SPATIAL_CONFIG.duskRadius,
            nightRadius: config.nightRadius ?? DEFAULT_SPATIAL_CONFIG.nightRadius,
            lightRadius: config.lightRadius ?? DEFAULT_SPATIAL_CONFIG.lightRadius,
        };

        this.daylight = windowProfile(this.config.viewport);
        this.dusk = ringProfile(this.config.duskRadius);
        this.night = ringProfile(this.config.nightRadius);
        this.lit = ringProfile(this.config.lightRadius);
    }

    /**
     * Profile for the current clock. A light source only helps outside of
     * daylight and only when its ring is wider than the phase's own.
     * An invalid clock gets the night profile.
     */
    select(clock: ClockStateInput): RadiusProfile {
        const parsed = ClockStateSchema.safeParse(clock);
        if (!parsed.success) {
            log.warn(`Invalid clock state ${JSON.stringify(clock)}, using night profile`);
            return this.night;
        }

        const phase = dayPhaseForHour(parsed.data.hour);
        if (phase === 'day') {
            return this.daylight;
        }

        const phaseRadius = phase === 'dusk' ? this.config.duskRadius : this.config.nightRadius;
        if (parsed.data.lightSourceActive && this.config.lightRadius > phaseRadius) {
            return this.lit;
        }
        return phase === 'dusk' ? this.dusk : this.night;
    }
}
