import { claimCell, isClaimed } from './claim-overlay.js';
import { charAt } from './ingest-grid.js';
import { LevelInvariantError, invalidWarpError } from './level-error.js';
import { MAX_WARP_ID, isAsciiDigit, warpIdFromNumber } from './level-legend.js';
import type { CharGrid, ClaimOverlay, Coordinate, WarpId, WarpMap, WarpPair } from './types.js';

function collectDigitCells(grid: CharGrid, overlay: ClaimOverlay): ReadonlyMap<number, readonly Coordinate[]> {
  const cellsByDigit = new Map<number, Coordinate[]>();

  for (let y = 0; y < grid.height; y += 1) {
    for (let x = 0; x < grid.width; x += 1) {
      if (isClaimed(overlay, x, y)) {
        continue;
      }
      const char = charAt(grid, x, y);
      if (char === undefined || !isAsciiDigit(char)) {
        continue;
      }
      const digit = Number(char);
      const cells = cellsByDigit.get(digit) ?? [];
      cells.push({ x, y });
      cellsByDigit.set(digit, cells);
      claimCell(overlay, x, y);
    }
  }

  return cellsByDigit;
}

/**
 * Groups unclaimed digit cells into tunnel pairs. Ids must each appear exactly
 * twice and run contiguously from 1; `0` is reserved and always rejected.
 */
export function collectWarpPairs(grid: CharGrid, overlay: ClaimOverlay): WarpMap {
  const cellsByDigit = collectDigitCells(grid, overlay);
  const digits = [...cellsByDigit.keys()].sort((left, right) => left - right);
  const warps = new Map<WarpId, WarpPair>();
  if (digits.length === 0) {
    return warps;
  }

  for (const digit of digits) {
    const occurrences = cellsByDigit.get(digit)?.length ?? 0;
    if (occurrences !== 2) {
      throw invalidWarpError(`Warp ${digit} appears ${occurrences} time(s); each warp must appear exactly twice.`, {
        warpId: digit,
        occurrences,
      });
    }
  }

  for (const [index, digit] of digits.entries()) {
    if (digit !== index + 1) {
      throw invalidWarpError(`Warp ids must be contiguous starting at 1; found ${digits.join(', ')}.`, {
        warpIds: digits,
      });
    }
  }

  if (digits.length > MAX_WARP_ID) {
    throw invalidWarpError(`At most ${MAX_WARP_ID} warps are allowed; found ${digits.length}.`, { warpIds: digits });
  }

  for (const digit of digits) {
    const id = warpIdFromNumber(digit);
    const [a, b] = cellsByDigit.get(digit) ?? [];
    if (id === null || a === undefined || b === undefined) {
      throw new LevelInvariantError(`Warp ${digit} passed validation without a tunnel id and two endpoints.`);
    }
    warps.set(id, { id, a, b });
  }

  return warps;
}
