import type { CellCode, WarpCellCode, WarpId } from './types.js';

export const EMPTY_CHAR = ' ';
export const WALL_CHAR = '#';
export const DOT_CHAR = '-';
export const POWER_PELLET_CHAR = '!';
export const PAC_SPAWN_CHAR = '$';
export const GHOST_SPAWN_CHAR = '@';

export const CELL_EMPTY = 0;
export const CELL_WALL = 1;
export const CELL_DOT = 2;
export const CELL_POWER_PELLET = 3;

export const GHOST_SPAWN_WIDTH = 8;
export const GHOST_SPAWN_HEIGHT = 5;
export const PAC_SPAWN_WIDTH = 2;

export const MAX_WARP_ID = 9;

export const STARTING_LIVES = 3;
export const STARTING_POINTS = 0;

/** Single-character terrain with a fixed code. Spawn markers and digits are resolved by the detectors. */
export const TERRAIN_CELL_CODES: Readonly<Record<string, CellCode>> = {
  [EMPTY_CHAR]: CELL_EMPTY,
  [WALL_CHAR]: CELL_WALL,
  [DOT_CHAR]: CELL_DOT,
  [POWER_PELLET_CHAR]: CELL_POWER_PELLET,
};

const WARP_ID_BY_CHAR: Readonly<Record<string, WarpId>> = {
  '1': 1,
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9,
};

const WARP_CELL_CODE_BY_ID: Readonly<Record<WarpId, WarpCellCode>> = {
  1: -1,
  2: -2,
  3: -3,
  4: -4,
  5: -5,
  6: -6,
  7: -7,
  8: -8,
  9: -9,
};

export function isAsciiDigit(char: string): boolean {
  return char.length === 1 && char >= '0' && char <= '9';
}

/** `'0'` and every non-digit yield null; zero is reserved and never names a tunnel. */
export function warpIdFromChar(char: string): WarpId | null {
  return WARP_ID_BY_CHAR[char] ?? null;
}

export function warpIdFromNumber(value: number): WarpId | null {
  return WARP_ID_BY_CHAR[String(value)] ?? null;
}

export function warpCellCode(id: WarpId): WarpCellCode {
  return WARP_CELL_CODE_BY_ID[id];
}
