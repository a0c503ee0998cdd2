import { claimRect, isClaimed } from './claim-overlay.js';
import { charAt } from './ingest-grid.js';
import { invalidPacSpawnError, multiplePacSpawnsError, noPacSpawnError } from './level-error.js';
import { PAC_SPAWN_CHAR, PAC_SPAWN_WIDTH } from './level-legend.js';
import type { CharGrid, ClaimOverlay, PacSpawn } from './types.js';

export function detectPacSpawn(grid: CharGrid, overlay: ClaimOverlay): PacSpawn {
  let spawn: PacSpawn | null = null;

  for (let y = 0; y < grid.height; y += 1) {
    for (let x = 0; x + PAC_SPAWN_WIDTH <= grid.width; x += 1) {
      if (isClaimed(overlay, x, y) || isClaimed(overlay, x + 1, y)) {
        continue;
      }
      if (charAt(grid, x, y) !== PAC_SPAWN_CHAR || charAt(grid, x + 1, y) !== PAC_SPAWN_CHAR) {
        continue;
      }
      if (spawn !== null) {
        throw multiplePacSpawnsError(spawn, { x, y });
      }
      spawn = { x, y };
      claimRect(overlay, spawn, PAC_SPAWN_WIDTH, 1);
    }
  }

  for (let y = 0; y < grid.height; y += 1) {
    for (let x = 0; x < grid.width; x += 1) {
      if (charAt(grid, x, y) === PAC_SPAWN_CHAR && !isClaimed(overlay, x, y)) {
        throw invalidPacSpawnError({ x, y });
      }
    }
  }

  if (spawn === null) {
    throw noPacSpawnError();
  }
  return spawn;
}
