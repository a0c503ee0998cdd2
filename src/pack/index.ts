export * from './level-pack-schema.js';
export * from './load-level-pack.js';
