/**
 * Passability presets for the kinds of querent the game routes.
 *
 * Each creature variant picks one of these (or builds its own set) and hands
 * it to the router; the router itself knows nothing about creature kinds.
 */

import { IMPASSABLE_TERRAIN, TERRAIN_KINDS, TerrainKind } from '../../schema/terrain.js';

export type PassabilitySet = ReadonlySet<TerrainKind>;

export type QuerentKind = 'walker' | 'wader' | 'swimmer' | 'any';

/** Land animals: boars, snakes */
export const WALKER_TERRAIN: PassabilitySet = new Set<TerrainKind>([
    'dirt',
    'grass',
    'sand',
    'tree',
    'floor',
    'stone_floor',
]);

/** Walkers that will also cross shallows */
export const WADER_TERRAIN: PassabilitySet = new Set<TerrainKind>([
    ...WALKER_TERRAIN,
    'water',
]);

/** Sharks and other open-water creatures */
export const SWIMMER_TERRAIN: PassabilitySet = new Set<TerrainKind>([
    'deep_water',
]);

/** Everything that is not a wall, peak, gate or the edge of the world */
export const ANY_PASSABLE_TERRAIN: PassabilitySet = new Set<TerrainKind>(
    TERRAIN_KINDS.filter(kind => !IMPASSABLE_TERRAIN.has(kind))
);

const PRESETS: Record<QuerentKind, PassabilitySet> = {
    walker: WALKER_TERRAIN,
    wader: WADER_TERRAIN,
    swimmer: SWIMMER_TERRAIN,
    any: ANY_PASSABLE_TERRAIN,
};

export function passabilityFor(kind: QuerentKind): PassabilitySet {
    return PRESETS[kind];
}

export function isPassableBy(terrain: TerrainKind | undefined, passability: PassabilitySet): boolean {
    return terrain !== undefined && passability.has(terrain);
}
