/**
 * Tidewatch - spatial core for turn-based grid-world games.
 *
 * Two independent engines over a shared terrain and occupancy model:
 * - Router: A* paths with a substitute goal for unstandable destinations
 * - Visibility Scanner: perimeter beamcasting with canopy, fog and vessels
 */

// Schemas and configuration
export * from './schema/base-schemas.js';
export * from './schema/terrain.js';
export * from './schema/clock.js';
export * from './schema/weather.js';
export * from './schema/config.js';
export { loadSpatialConfig, readEnvConfig, DEFAULT_SPATIAL_CONFIG } from './utils/config.js';
export { GridShapeError, OccupancyError, SpatialConfigError } from './utils/errors.js';
export {
    createLogger,
    setLogLevel,
    resetLogLevel,
    getErrorMessage,
    type Logger,
    type LogLevel
} from './utils/logger.js';

// Spatial model
export * from './engine/spatial/geometry.js';
export { MinHeap } from './engine/spatial/heap.js';
export { GridTerrain, type Grid, type TerrainOracle } from './engine/spatial/terrain.js';
export * from './engine/spatial/passability.js';
export * from './engine/spatial/vessel.js';
export * from './engine/spatial/occupancy.js';
export * from './engine/spatial/items.js';

// Router
export { Router, findPath, type RouterOptions } from './engine/spatial/router.js';

// Visibility
export * from './engine/visibility/radius-profile.js';
export * from './engine/visibility/no-fog-zone.js';
export * from './engine/visibility/scene.js';
export { VisibilityBuffer, castVisibility, type BeamcastInput } from './engine/visibility/beamcast.js';
export * from './engine/visibility/render.js';
export { computeVisibility, type VisibilityQuery, type ScannerOptions } from './engine/visibility/scanner.js';

// Weather
export { FogGenerator, generateFogCells } from './engine/weather/fog.js';
