export * from './maze-types.js';
export { parseMaze, parseLevel, MAX_GRID_DIMENSION } from './maze-parser.js';
export { resolveStep, isAtExit } from './collision.js';
export { toLevelDescriptor } from './level-descriptor.js';
