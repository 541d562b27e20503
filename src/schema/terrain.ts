import { z } from 'zod';

/**
 * Terrain kinds a grid cell can hold.
 */
export const TerrainKindSchema = z.enum([
    'blank',        // Unlit/unknown void
    'wall',
    'wood_wall',
    'tree',         // Canopy: thins sight lines rather than blocking them
    'dirt',
    'grass',
    'water',        // Shallow, wadeable
    'deep_water',   // Swimmers and vessels only
    'world_edge',
    'sand',
    'mountain',
    'snow_peak',
    'gate',
    'stone_floor',
    'lava',
    'fire_pit',
    'old_fire_pit',
    'floor',
    'window',
    'deck',         // Walkable ship deck
]);
export type TerrainKind = z.infer<typeof TerrainKindSchema>;

export const TERRAIN_KINDS: readonly TerrainKind[] = TerrainKindSchema.options;

/**
 * Terrain that stops a sight line outright. The blocking cell itself is seen.
 */
export const OPAQUE_TERRAIN: ReadonlySet<TerrainKind> = new Set<TerrainKind>([
    'blank',
    'wall',
    'wood_wall',
    'mountain',
    'snow_peak',
]);

/**
 * Semi-transparent terrain that shortens the rest of a sight line.
 */
export const CANOPY_TERRAIN: ReadonlySet<TerrainKind> = new Set<TerrainKind>([
    'tree',
]);

/**
 * Terrain nothing can stand on, whatever its passability set says elsewhere.
 */
export const IMPASSABLE_TERRAIN: ReadonlySet<TerrainKind> = new Set<TerrainKind>([
    'blank',
    'wall',
    'wood_wall',
    'world_edge',
    'mountain',
    'snow_peak',
    'gate',
    'window',
]);
