import { GHOST_SPAWN_HEIGHT, GHOST_SPAWN_WIDTH, PAC_SPAWN_WIDTH, warpCellCode } from './level-legend.js';
import { SerializedLevelSchema, type SerializedLevel } from './schemas.js';
import type { Board, CellCode, Coordinate, Level, WarpId, WarpPair } from './types.js';

const copyCells = (cells: readonly (readonly CellCode[])[]): CellCode[][] => cells.map((row) => [...row]);

export const serializeLevel = (level: Level): SerializedLevel => ({
  board: {
    width: level.board.width,
    height: level.board.height,
    cells: copyCells(level.board.cells),
  },
  ghostSpawn: { ...level.ghostSpawn },
  pacSpawn: { ...level.pacSpawn },
  warps: [...level.warps.values()]
    .sort((left, right) => left.id - right.id)
    .map((warp) => ({ id: warp.id, a: { ...warp.a }, b: { ...warp.b } })),
  positions: {
    pacman: { ...level.positions.pacman },
    blinky: { ...level.positions.blinky },
    pinky: { ...level.positions.pinky },
    inky: { ...level.positions.inky },
    clyde: { ...level.positions.clyde },
  },
  dotCount: level.dotCount,
  powerPelletCount: level.powerPelletCount,
  lives: level.lives,
  points: level.points,
});

const invalidLevel = (path: string, message: string): TypeError =>
  new TypeError(`Invalid serialized level at ${path}: ${message}`);

const formatCell = ({ x, y }: Coordinate): string => `(${x}, ${y})`;

const validateBoardShape = (board: Board): void => {
  if (board.cells.length !== board.height) {
    throw invalidLevel('board.cells', `expected ${board.height} rows, received ${board.cells.length}`);
  }
  board.cells.forEach((row, y) => {
    if (row.length !== board.width) {
      throw invalidLevel(`board.cells[${y}]`, `expected ${board.width} columns, received ${row.length}`);
    }
  });
};

const fitsBoard = (board: Board, origin: Coordinate, width: number, height: number): boolean =>
  origin.x + width <= board.width && origin.y + height <= board.height;

const validateSpawns = (board: Board, ghostSpawn: Coordinate, pacSpawn: Coordinate): void => {
  if (!fitsBoard(board, ghostSpawn, GHOST_SPAWN_WIDTH, GHOST_SPAWN_HEIGHT)) {
    throw invalidLevel(
      'ghostSpawn',
      `pen at ${formatCell(ghostSpawn)} does not fit the ${board.width}x${board.height} board`,
    );
  }
  if (!fitsBoard(board, pacSpawn, PAC_SPAWN_WIDTH, 1)) {
    throw invalidLevel('pacSpawn', `spawn at ${formatCell(pacSpawn)} does not fit the ${board.width}x${board.height} board`);
  }
};

// Row-major, so the first cell of each id is the `a` endpoint.
const collectWarpCells = (board: Board): ReadonlyMap<number, readonly Coordinate[]> => {
  const cellsById = new Map<number, Coordinate[]>();
  board.cells.forEach((row, y) => {
    row.forEach((code, x) => {
      if (code >= 0) {
        return;
      }
      const cells = cellsById.get(-code) ?? [];
      cells.push({ x, y });
      cellsById.set(-code, cells);
    });
  });
  return cellsById;
};

const sameCell = (left: Coordinate, right: Coordinate): boolean => left.x === right.x && left.y === right.y;

const validateWarps = (board: Board, warps: readonly WarpPair[]): void => {
  const cellsById = collectWarpCells(board);
  const seen = new Set<WarpId>();

  warps.forEach((warp, index) => {
    if (seen.has(warp.id)) {
      throw invalidLevel(`warps[${index}].id`, `duplicate warp ${warp.id}`);
    }
    seen.add(warp.id);

    for (const endpoint of ['a', 'b'] as const) {
      const { x, y } = warp[endpoint];
      if (board.cells[y]?.[x] !== warpCellCode(warp.id)) {
        throw invalidLevel(`warps[${index}].${endpoint}`, `cell (${x}, ${y}) is not warp ${warp.id}`);
      }
    }

    const cells = cellsById.get(warp.id) ?? [];
    const [first, second] = cells;
    if (cells.length !== 2 || first === undefined || second === undefined) {
      throw invalidLevel(`warps[${index}]`, `warp ${warp.id} occupies ${cells.length} cell(s), expected 2`);
    }
    if (!sameCell(warp.a, first)) {
      throw invalidLevel(`warps[${index}].a`, `expected ${formatCell(first)}, received ${formatCell(warp.a)}`);
    }
    if (!sameCell(warp.b, second)) {
      throw invalidLevel(`warps[${index}].b`, `expected ${formatCell(second)}, received ${formatCell(warp.b)}`);
    }
  });

  for (const [id, cells] of cellsById) {
    const [cell] = cells;
    if (cell !== undefined && !warps.some((warp) => warp.id === id)) {
      throw invalidLevel(`board.cells[${cell.y}][${cell.x}]`, `warp ${id} has no entry in warps`);
    }
  }

  const ids = warps.map((warp) => warp.id).sort((left, right) => left - right);
  if (ids.some((id, index) => id !== index + 1)) {
    throw invalidLevel('warps', `ids must run contiguously from 1; found ${ids.join(', ')}`);
  }
};

export const deserializeLevel = (value: unknown): Level => {
  const parsed = SerializedLevelSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue === undefined || issue.path.length === 0 ? 'level' : issue.path.join('.');
    throw invalidLevel(path, issue?.message ?? 'unknown issue');
  }

  const serialized = parsed.data;
  const board: Board = {
    width: serialized.board.width,
    height: serialized.board.height,
    cells: copyCells(serialized.board.cells),
  };
  validateBoardShape(board);
  validateSpawns(board, serialized.ghostSpawn, serialized.pacSpawn);
  validateWarps(board, serialized.warps);

  const warps = new Map<WarpId, WarpPair>(
    [...serialized.warps].sort((left, right) => left.id - right.id).map((warp): [WarpId, WarpPair] => [warp.id, warp]),
  );

  return {
    board,
    ghostSpawn: serialized.ghostSpawn,
    pacSpawn: serialized.pacSpawn,
    warps,
    positions: serialized.positions,
    dotCount: serialized.dotCount,
    powerPelletCount: serialized.powerPelletCount,
    lives: serialized.lives,
    points: serialized.points,
  };
};
