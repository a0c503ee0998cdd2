export interface Coordinate {
  readonly x: number;
  readonly y: number;
}

/** Sub-tile position; entities move on a grid finer than the tiles. */
export interface Position {
  readonly x: number;
  readonly y: number;
}

export interface CharGrid {
  readonly width: number;
  readonly height: number;
  readonly rows: readonly (readonly string[])[];
}

export interface ClaimOverlay {
  readonly width: number;
  readonly height: number;
  readonly claimed: readonly boolean[][];
}

export type GhostSpawn = Coordinate;

export type PacSpawn = Coordinate;

export type WarpId = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export type WarpCellCode = -1 | -2 | -3 | -4 | -5 | -6 | -7 | -8 | -9;

export type CellCode = 0 | 1 | 2 | 3 | WarpCellCode;

export interface WarpPair {
  readonly id: WarpId;
  readonly a: Coordinate;
  readonly b: Coordinate;
}

export type WarpMap = ReadonlyMap<WarpId, WarpPair>;

/**
 * Numeric tile grid indexed `cells[y][x]`. The rows stay mutable: the game loop
 * owns the board once parsing hands it over and clears dots as they are eaten.
 */
export interface Board {
  readonly width: number;
  readonly height: number;
  readonly cells: CellCode[][];
}

export interface EntityPositions {
  readonly pacman: Position;
  readonly blinky: Position;
  readonly pinky: Position;
  readonly inky: Position;
  readonly clyde: Position;
}

export interface Level {
  readonly board: Board;
  readonly ghostSpawn: GhostSpawn;
  readonly pacSpawn: PacSpawn;
  readonly warps: WarpMap;
  readonly positions: EntityPositions;
  readonly dotCount: number;
  readonly powerPelletCount: number;
  readonly lives: number;
  readonly points: number;
}
