export * from './level/index.js';
export * from './pack/index.js';
