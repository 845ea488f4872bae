export * from './coords/types.js';
export * from './coords/axial.js';
export * from './coords/cube.js';
export * from './coords/offset.js';
export * from './coords/doubled.js';
export * from './coords/square.js';
export * from './coords/rounding.js';
export * from './coords/geometry.js';
export * from './map/tile.js';
export * from './map/tile-map.js';
export * from './map/types.js';
export * from './map/pathfinder.js';
export { logger } from './logger.js';
