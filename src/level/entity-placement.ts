import type { EntityPositions, GhostSpawn, PacSpawn } from './types.js';

/** Offsets from the pen's top-left corner, mirroring the arcade layout. */
export const GHOST_START_OFFSETS = {
  blinky: { x: 3.5, y: -1 },
  pinky: { x: 3.5, y: 2 },
  inky: { x: 1.5, y: 2 },
  clyde: { x: 5.5, y: 2 },
} as const;

export const PACMAN_START_OFFSET = { x: 0.5, y: 0 } as const;

export function deriveEntityPositions(ghostSpawn: GhostSpawn, pacSpawn: PacSpawn): EntityPositions {
  const fromGhostSpawn = (offset: { readonly x: number; readonly y: number }) => ({
    x: ghostSpawn.x + offset.x,
    y: ghostSpawn.y + offset.y,
  });

  return {
    pacman: { x: pacSpawn.x + PACMAN_START_OFFSET.x, y: pacSpawn.y + PACMAN_START_OFFSET.y },
    blinky: fromGhostSpawn(GHOST_START_OFFSETS.blinky),
    pinky: fromGhostSpawn(GHOST_START_OFFSETS.pinky),
    inky: fromGhostSpawn(GHOST_START_OFFSETS.inky),
    clyde: fromGhostSpawn(GHOST_START_OFFSETS.clyde),
  };
}
