import { claimRect, isClaimed, rectOverlapsClaim } from './claim-overlay.js';
import { charAt } from './ingest-grid.js';
import {
  invalidGhostSpawnError,
  invalidGhostSpawnPeripheralError,
  multipleGhostSpawnsError,
  noGhostSpawnError,
} from './level-error.js';
import { EMPTY_CHAR, GHOST_SPAWN_CHAR, GHOST_SPAWN_HEIGHT, GHOST_SPAWN_WIDTH } from './level-legend.js';
import type { CharGrid, ClaimOverlay, Coordinate, GhostSpawn } from './types.js';

function isGhostBlockAt(grid: CharGrid, origin: Coordinate): boolean {
  for (let dy = 0; dy < GHOST_SPAWN_HEIGHT; dy += 1) {
    for (let dx = 0; dx < GHOST_SPAWN_WIDTH; dx += 1) {
      if (charAt(grid, origin.x + dx, origin.y + dy) !== GHOST_SPAWN_CHAR) {
        return false;
      }
    }
  }
  return true;
}

/**
 * Cells kept open above and below the two center columns of the block, where
 * ghosts leave the pen and fruit appears.
 */
export function ghostSpawnPeripheralCells(spawn: GhostSpawn): readonly Coordinate[] {
  const above = spawn.y - 1;
  const below = spawn.y + GHOST_SPAWN_HEIGHT;
  const left = spawn.x + GHOST_SPAWN_WIDTH / 2 - 1;
  const right = spawn.x + GHOST_SPAWN_WIDTH / 2;
  return [
    { x: left, y: above },
    { x: right, y: above },
    { x: left, y: below },
    { x: right, y: below },
  ];
}

function assertPeripheralClearance(grid: CharGrid, spawn: GhostSpawn): void {
  for (const cell of ghostSpawnPeripheralCells(spawn)) {
    if (charAt(grid, cell.x, cell.y) !== EMPTY_CHAR) {
      throw invalidGhostSpawnPeripheralError(cell);
    }
  }
}

/**
 * Locates the single 8x5 ghost pen and claims its cells.
 *
 * Brute-force window scan, O(width * height * 40) in the worst case. Windows
 * that overlap the already accepted block are the same pen seen at an offset
 * and are skipped; the leftover cells of an oversized block then surface as
 * stray markers.
 */
export function detectGhostSpawn(grid: CharGrid, overlay: ClaimOverlay): GhostSpawn {
  let spawn: GhostSpawn | null = null;

  for (let y = 0; y + GHOST_SPAWN_HEIGHT <= grid.height; y += 1) {
    for (let x = 0; x + GHOST_SPAWN_WIDTH <= grid.width; x += 1) {
      const origin = { x, y };
      if (!isGhostBlockAt(grid, origin)) {
        continue;
      }
      if (spawn === null) {
        spawn = origin;
        claimRect(overlay, origin, GHOST_SPAWN_WIDTH, GHOST_SPAWN_HEIGHT);
        continue;
      }
      if (rectOverlapsClaim(overlay, origin, GHOST_SPAWN_WIDTH, GHOST_SPAWN_HEIGHT)) {
        continue;
      }
      throw multipleGhostSpawnsError(spawn, origin);
    }
  }

  for (let y = 0; y < grid.height; y += 1) {
    for (let x = 0; x < grid.width; x += 1) {
      if (charAt(grid, x, y) === GHOST_SPAWN_CHAR && !isClaimed(overlay, x, y)) {
        throw invalidGhostSpawnError({ x, y });
      }
    }
  }

  if (spawn === null) {
    throw noGhostSpawnError();
  }

  assertPeripheralClearance(grid, spawn);
  return spawn;
}
