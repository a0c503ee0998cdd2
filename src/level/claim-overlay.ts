import type { CharGrid, ClaimOverlay, Coordinate } from './types.js';

export function createClaimOverlay(grid: CharGrid): ClaimOverlay {
  return {
    width: grid.width,
    height: grid.height,
    claimed: Array.from({ length: grid.height }, () => Array.from({ length: grid.width }, () => false)),
  };
}

export function isClaimed(overlay: ClaimOverlay, x: number, y: number): boolean {
  return overlay.claimed[y]?.[x] === true;
}

export function claimCell(overlay: ClaimOverlay, x: number, y: number): void {
  const row = overlay.claimed[y];
  if (row === undefined || x < 0 || x >= overlay.width) {
    throw new RangeError(`Cannot claim (${x}, ${y}) outside a ${overlay.width}x${overlay.height} grid.`);
  }
  row[x] = true;
}

export function claimRect(overlay: ClaimOverlay, origin: Coordinate, width: number, height: number): void {
  for (let dy = 0; dy < height; dy += 1) {
    for (let dx = 0; dx < width; dx += 1) {
      claimCell(overlay, origin.x + dx, origin.y + dy);
    }
  }
}

export function rectOverlapsClaim(overlay: ClaimOverlay, origin: Coordinate, width: number, height: number): boolean {
  for (let dy = 0; dy < height; dy += 1) {
    for (let dx = 0; dx < width; dx += 1) {
      if (isClaimed(overlay, origin.x + dx, origin.y + dy)) {
        return true;
      }
    }
  }
  return false;
}
