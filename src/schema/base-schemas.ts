/**
 * Base Schema Definitions - Reusable Zod field patterns
 *
 * Coordinates, offsets and viewport sizes shared by the router, the
 * visibility scanner and the weather module.
 *
 * USAGE:
 * ```typescript
 * import { CoordSchema, ViewportSchema } from './base-schemas.js';
 *
 * const parsed = CoordSchema.safeParse(input);
 * if (!parsed.success) return [];
 * ```
 *
 * @module schema/base-schemas
 */

import { z } from 'zod';

// ============================================================================
// GRID COORDINATES
// ============================================================================

/**
 * Integer grid cell coordinate. Row grows downward, column grows rightward.
 * Bounds are not part of the schema; they depend on the grid being queried.
 */
export const CoordSchema = z.object({
    row: z.number().int().describe('Grid row'),
    col: z.number().int().describe('Grid column'),
});
export type Coord = z.infer<typeof CoordSchema>;

/**
 * Offset relative to some origin cell (e.g. a radius profile boundary point)
 */
export const OffsetSchema = z.object({
    dr: z.number().int(),
    dc: z.number().int(),
});
export type Offset = z.infer<typeof OffsetSchema>;

// ============================================================================
// VIEWPORT
// ============================================================================

/**
 * Size of the window a viewer sees, in cells. The viewer sits at
 * (floor(height / 2), floor(width / 2)).
 */
export const ViewportSchema = z.object({
    height: z.number().int().min(1).max(255),
    width: z.number().int().min(1).max(255),
});
export type Viewport = z.infer<typeof ViewportSchema>;

// ============================================================================
// COMPASS
// ============================================================================

/**
 * Vessel bearing on the 16-point compass, 0 = north, clockwise. Any integer
 * is accepted and wrapped; NaN and infinities are not.
 */
export const BearingSchema = z.number().int();
export type Bearing = z.infer<typeof BearingSchema>;
