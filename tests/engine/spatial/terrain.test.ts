import { GridTerrain } from '../../../src/engine/spatial/terrain.js';
import { ANY_PASSABLE_TERRAIN, isPassableBy, passabilityFor, WADER_TERRAIN } from '../../../src/engine/spatial/passability.js';

describe('GridTerrain', () => {
    const terrain = new GridTerrain([
        ['grass', 'tree', 'wall'],
        ['water', 'deep_water', 'mountain'],
    ]);

    it('reports its dimensions', () => {
        expect(terrain.rows).toBe(2);
        expect(terrain.cols).toBe(3);
    });

    it('reads terrain row-major', () => {
        expect(terrain.terrainAt({ row: 0, col: 1 })).toBe('tree');
        expect(terrain.terrainAt({ row: 1, col: 0 })).toBe('water');
    });

    it('returns undefined outside the grid', () => {
        expect(terrain.terrainAt({ row: -1, col: 0 })).toBeUndefined();
        expect(terrain.terrainAt({ row: 0, col: 3 })).toBeUndefined();
        expect(terrain.terrainAt({ row: 2, col: 0 })).toBeUndefined();
    });

    it('rejects fractional coordinates', () => {
        expect(terrain.isInBounds({ row: 0.5, col: 0 })).toBe(false);
    });

    it('classifies sight blockers and canopy', () => {
        expect(terrain.isFullyOpaque('wall')).toBe(true);
        expect(terrain.isFullyOpaque('mountain')).toBe(true);
        expect(terrain.isFullyOpaque('tree')).toBe(false);
        expect(terrain.isFullyOpaque('window')).toBe(false);
        expect(terrain.isCanopy('tree')).toBe(true);
        expect(terrain.isCanopy('grass')).toBe(false);
    });

    it('builds a uniform grid', () => {
        const sea = GridTerrain.filled(4, 6, 'deep_water');

        expect(sea.rows).toBe(4);
        expect(sea.cols).toBe(6);
        expect(sea.terrainAt({ row: 3, col: 5 })).toBe('deep_water');
    });
});

describe('passability', () => {
    it('maps querent kinds to presets', () => {
        expect(passabilityFor('walker').has('grass')).toBe(true);
        expect(passabilityFor('walker').has('water')).toBe(false);
        expect(passabilityFor('swimmer').has('deep_water')).toBe(true);
        expect(passabilityFor('swimmer').has('grass')).toBe(false);
        expect(passabilityFor('wader')).toBe(WADER_TERRAIN);
    });

    it('leaves walls and the world edge out of the permissive set', () => {
        expect(ANY_PASSABLE_TERRAIN.has('wall')).toBe(false);
        expect(ANY_PASSABLE_TERRAIN.has('world_edge')).toBe(false);
        expect(ANY_PASSABLE_TERRAIN.has('lava')).toBe(true);
        expect(ANY_PASSABLE_TERRAIN.has('deck')).toBe(true);
    });

    it('never passes undefined terrain', () => {
        expect(isPassableBy(undefined, ANY_PASSABLE_TERRAIN)).toBe(false);
    });
});
