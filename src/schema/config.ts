import { z } from 'zod';
import { ViewportSchema } from './base-schemas.js';

export const HeuristicSchema = z.enum(['manhattan', 'euclidean', 'chebyshev']);
export type Heuristic = z.infer<typeof HeuristicSchema>;

/**
 * Tunables for both engines. Every field has a default so an empty object
 * parses to a complete configuration.
 */
export const SpatialConfigSchema = z.object({
    floodFillRadius: z.number().int().min(1).max(256).default(30)
        .describe('Euclidean cap, from the start cell, on the substitute-goal search'),
    heuristic: HeuristicSchema.default('manhattan')
        .describe('A* distance estimate to the goal'),
    canopyAttenuation: z.number().int().min(0).max(64).default(3)
        .describe('Cells a sight line loses per canopy cell it crosses'),
    viewport: ViewportSchema.default({ height: 21, width: 41 }),
    duskRadius: z.number().int().min(1).max(128).default(10),
    nightRadius: z.number().int().min(1).max(128).default(5),
    lightRadius: z.number().int().min(1).max(128).default(8)
        .describe('Sight radius with a light source outside of daylight'),
    noFogHaloRadius: z.number().int().min(1).max(32).default(3)
        .describe('Radius of the fog-free disc around a viewer carrying a light'),
});
export type SpatialConfig = z.infer<typeof SpatialConfigSchema>;
export type SpatialConfigInput = z.input<typeof SpatialConfigSchema>;
