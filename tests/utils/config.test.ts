import { DEFAULT_SPATIAL_CONFIG, loadSpatialConfig, readEnvConfig } from '../../src/utils/config.js';
import { SpatialConfigError } from '../../src/utils/errors.js';

describe('spatial config', () => {
    describe('defaults', () => {
        it('fills every field when nothing is set', () => {
            expect(loadSpatialConfig({}, {})).toEqual({
                floodFillRadius: 30,
                heuristic: 'manhattan',
                canopyAttenuation: 3,
                viewport: { height: 21, width: 41 },
                duskRadius: 10,
                nightRadius: 5,
                lightRadius: 8,
                noFogHaloRadius: 3,
            });
        });

        it('exposes the same defaults without reading the environment', () => {
            expect(DEFAULT_SPATIAL_CONFIG).toEqual(loadSpatialConfig({}, {}));
        });
    });

    describe('readEnvConfig', () => {
        it('omits unset and blank variables', () => {
            expect(readEnvConfig({ TIDEWATCH_DUSK_RADIUS: '  ' })).toEqual({});
        });

        it('reads numbers and a trimmed, lowercased heuristic', () => {
            expect(readEnvConfig({
                TIDEWATCH_FLOOD_FILL_RADIUS: '12',
                TIDEWATCH_HEURISTIC: ' Chebyshev ',
            })).toEqual({ floodFillRadius: 12, heuristic: 'chebyshev' });
        });

        it('completes a half-specified viewport from the defaults', () => {
            expect(readEnvConfig({ TIDEWATCH_VIEWPORT_HEIGHT: '11' })).toEqual({
                viewport: { height: 11, width: 41 },
            });
        });
    });

    describe('loadSpatialConfig', () => {
        it('layers overrides over the environment', () => {
            const config = loadSpatialConfig(
                { floodFillRadius: 20 },
                { TIDEWATCH_FLOOD_FILL_RADIUS: '12', TIDEWATCH_NIGHT_RADIUS: '4' }
            );

            expect(config.floodFillRadius).toBe(20);
            expect(config.nightRadius).toBe(4);
            expect(config.duskRadius).toBe(10);
        });

        it('rejects non-numeric environment values', () => {
            let caught: unknown;
            try {
                loadSpatialConfig({}, { TIDEWATCH_FLOOD_FILL_RADIUS: 'far' });
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(SpatialConfigError);
            if (caught instanceof SpatialConfigError) {
                expect(caught.message).toBe('Invalid spatial configuration from environment');
                expect(caught.issues).toHaveLength(1);
                expect(caught.issues[0].startsWith('floodFillRadius: ')).toBe(true);
            }
        });

        it('rejects an unknown heuristic from the environment', () => {
            expect(() => loadSpatialConfig({}, { TIDEWATCH_HEURISTIC: 'octile' }))
                .toThrow('Invalid spatial configuration from environment');
        });

        it('reports out-of-range overrides by field', () => {
            let caught: unknown;
            try {
                loadSpatialConfig({ canopyAttenuation: -1 }, {});
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(SpatialConfigError);
            if (caught instanceof SpatialConfigError) {
                expect(caught.message).toBe('Invalid spatial configuration from overrides');
                expect(caught.issues).toEqual(['canopyAttenuation: Number must be greater than or equal to 0']);
            }
        });

        it('rejects a viewport wider than 255 cells', () => {
            expect(() => loadSpatialConfig({ viewport: { height: 21, width: 300 } }, {}))
                .toThrow(SpatialConfigError);
        });
    });
});
