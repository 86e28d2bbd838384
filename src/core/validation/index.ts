export * from './types.js';
export * from './modes.js';
export * from './engine.js';
