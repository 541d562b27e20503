import { bresenhamCircle, coordKey } from '../../../src/engine/spatial/geometry.js';
import { GridTerrain } from '../../../src/engine/spatial/terrain.js';
import { FogGenerator, generateFogCells } from '../../../src/engine/weather/fog.js';

describe('fog generation', () => {
    const terrain = GridTerrain.filled(11, 11, 'deep_water');

    it('fogs every ring point at full intensity', () => {
        const fog = generateFogCells([{ row: 5, col: 5, radius: 1, intensity: 1 }], terrain, 'test-seed');

        expect([...fog].sort()).toEqual(['4,5', '5,4', '5,6', '6,5']);
    });

    it('samples each ring out to the radius', () => {
        const fog = generateFogCells([{ row: 5, col: 5, radius: 2, intensity: 1 }], terrain, 'test-seed');

        expect(fog.size).toBe(16);
        expect(fog.has('5,5')).toBe(false);
        expect(fog.has('3,5')).toBe(true);
    });

    it('produces nothing at zero intensity', () => {
        expect(generateFogCells([{ row: 5, col: 5, radius: 3, intensity: 0 }], terrain, 'test-seed').size).toBe(0);
    });

    it('clips ring points to the grid', () => {
        const fog = generateFogCells([{ row: 0, col: 0, radius: 1, intensity: 1 }], terrain, 'test-seed');

        expect([...fog].sort()).toEqual(['0,1', '1,0']);
    });

    it('is repeatable for a seed', () => {
        const systems = [{ row: 5, col: 5, radius: 4, intensity: 0.5 }];
        const first = generateFogCells(systems, terrain, 'squall');
        const second = new FogGenerator('squall').generate(systems, terrain);

        expect([...second]).toEqual([...first]);
    });

    it('only fogs cells on the rings', () => {
        const rings = new Set(
            [1, 2, 3, 4].flatMap(r => bresenhamCircle({ row: 5, col: 5 }, r)).map(coordKey)
        );
        const fog = generateFogCells([{ row: 5, col: 5, radius: 4, intensity: 0.5 }], terrain, 'squall');

        for (const key of fog) {
            expect(rings.has(key)).toBe(true);
        }
    });

    it('skips invalid systems', () => {
        const fog = generateFogCells(
            [
                { row: 5, col: 5, radius: 0, intensity: 1 },
                { row: 2, col: 2, radius: 1, intensity: 1.5 },
                { row: 8, col: 8, radius: 1, intensity: 1 },
            ],
            terrain,
            'test-seed'
        );

        expect([...fog].sort()).toEqual(['7,8', '8,7', '8,9', '9,8']);
    });
});
