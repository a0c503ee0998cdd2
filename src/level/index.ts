export * from './claim-overlay.js';
export * from './detect-ghost-spawn.js';
export * from './detect-pac-spawn.js';
export * from './diagnostics.js';
export * from './encode-board.js';
export * from './entity-placement.js';
export * from './ingest-grid.js';
export * from './level-diagnostics.js';
export * from './level-error.js';
export * from './level-legend.js';
export * from './load-level-file.js';
export * from './parse-level.js';
export * from './schemas.js';
export * from './serde.js';
export * from './types.js';
export * from './validate-warps.js';
