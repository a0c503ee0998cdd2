import { createClaimOverlay } from './claim-overlay.js';
import { detectGhostSpawn } from './detect-ghost-spawn.js';
import { detectPacSpawn } from './detect-pac-spawn.js';
import { encodeBoard } from './encode-board.js';
import { deriveEntityPositions } from './entity-placement.js';
import { ingestGrid } from './ingest-grid.js';
import { isLevelError, type LevelError } from './level-error.js';
import { STARTING_LIVES, STARTING_POINTS } from './level-legend.js';
import type { Level } from './types.js';
import { collectWarpPairs } from './validate-warps.js';

export type LevelParseResult =
  | { readonly ok: true; readonly level: Level }
  | { readonly ok: false; readonly error: LevelError };

/**
 * Runs the full pipeline and throws the first `LevelError` met.
 *
 * Stage order fixes which defect is reported when a file has several:
 * ingestion, ghost pen, pac spawn, warps, then character encoding.
 */
export function parseLevelOrThrow(text: string): Level {
  const grid = ingestGrid(text);
  const overlay = createClaimOverlay(grid);

  const ghostSpawn = detectGhostSpawn(grid, overlay);
  const pacSpawn = detectPacSpawn(grid, overlay);
  const warps = collectWarpPairs(grid, overlay);
  const { board, dotCount, powerPelletCount } = encodeBoard(grid, overlay);

  return {
    board,
    ghostSpawn,
    pacSpawn,
    warps,
    positions: deriveEntityPositions(ghostSpawn, pacSpawn),
    dotCount,
    powerPelletCount,
    lives: STARTING_LIVES,
    points: STARTING_POINTS,
  };
}

export function parseLevel(text: string): LevelParseResult {
  try {
    return { ok: true, level: parseLevelOrThrow(text) };
  } catch (error) {
    if (isLevelError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}
