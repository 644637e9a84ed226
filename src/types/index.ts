export * from './enums.js';
export * from './raster.types.js';
export * from './renderer.types.js';
export * from './codec.types.js';
export * from './config.types.js';
export * from './export.types.js';
