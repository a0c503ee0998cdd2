import { isClaimed } from './claim-overlay.js';
import { LevelInvariantError, invalidCharactersError } from './level-error.js';
import {
  CELL_DOT,
  CELL_EMPTY,
  CELL_POWER_PELLET,
  CELL_WALL,
  GHOST_SPAWN_CHAR,
  PAC_SPAWN_CHAR,
  TERRAIN_CELL_CODES,
  warpCellCode,
  warpIdFromChar,
} from './level-legend.js';
import type { Board, CellCode, CharGrid, ClaimOverlay } from './types.js';

export interface EncodedBoard {
  readonly board: Board;
  readonly dotCount: number;
  readonly powerPelletCount: number;
}

function requireClaimed(overlay: ClaimOverlay, x: number, y: number, char: string): void {
  if (!isClaimed(overlay, x, y)) {
    throw new LevelInvariantError(`Marker ${JSON.stringify(char)} at (${x}, ${y}) reached the encoder unclaimed.`);
  }
}

function encodeCell(char: string, overlay: ClaimOverlay, x: number, y: number): CellCode {
  const terrain = TERRAIN_CELL_CODES[char];
  if (terrain !== undefined) {
    return terrain;
  }

  // Spawn markers were consumed into the spawn coordinates: the pac pair is
  // open floor and the ghost pen is impassable.
  if (char === PAC_SPAWN_CHAR) {
    requireClaimed(overlay, x, y, char);
    return CELL_EMPTY;
  }
  if (char === GHOST_SPAWN_CHAR) {
    requireClaimed(overlay, x, y, char);
    return CELL_WALL;
  }

  const warpId = warpIdFromChar(char);
  if (warpId !== null) {
    requireClaimed(overlay, x, y, char);
    return warpCellCode(warpId);
  }

  throw invalidCharactersError(char, { x, y });
}

function assertBoardShape(grid: CharGrid, cells: readonly (readonly CellCode[])[]): void {
  if (cells.length !== grid.height || cells.some((row) => row.length !== grid.width)) {
    throw new LevelInvariantError(`Encoded board does not match the ${grid.width}x${grid.height} grid.`);
  }
}

export function encodeBoard(grid: CharGrid, overlay: ClaimOverlay): EncodedBoard {
  const cells: CellCode[][] = [];
  let dotCount = 0;
  let powerPelletCount = 0;

  for (const [y, row] of grid.rows.entries()) {
    const encodedRow: CellCode[] = [];
    for (const [x, char] of row.entries()) {
      const code = encodeCell(char, overlay, x, y);
      if (code === CELL_DOT) {
        dotCount += 1;
      } else if (code === CELL_POWER_PELLET) {
        powerPelletCount += 1;
      }
      encodedRow.push(code);
    }
    cells.push(encodedRow);
  }

  assertBoardShape(grid, cells);
  return {
    board: { width: grid.width, height: grid.height, cells },
    dotCount,
    powerPelletCount,
  };
}

export function cellAt(board: Board, x: number, y: number): CellCode | undefined {
  return board.cells[y]?.[x];
}
