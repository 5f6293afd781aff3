export * from './player.js';
export * from './game-state.js';
export * from './level-data.js';
export * from './analytics.js';
export * from './network-messages.js';
