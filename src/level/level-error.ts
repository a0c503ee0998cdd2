import type { Coordinate } from './types.js';

export type LevelErrorCode =
  | 'FILE_READ'
  | 'LEVEL_EMPTY'
  | 'LEVEL_NOT_RECTANGULAR'
  | 'NO_GHOST_SPAWN'
  | 'MULTIPLE_GHOST_SPAWNS'
  | 'INVALID_GHOST_SPAWN'
  | 'INVALID_GHOST_SPAWN_PERIPHERAL'
  | 'NO_PAC_SPAWN'
  | 'MULTIPLE_PAC_SPAWNS'
  | 'INVALID_PAC_SPAWN'
  | 'INVALID_WARP'
  | 'INVALID_CHARACTERS';

export interface LevelErrorContext {
  readonly path?: string;
  readonly cell?: Coordinate;
  readonly char?: string;
  readonly width?: number;
  readonly height?: number;
  readonly row?: number;
  readonly rowWidth?: number;
  readonly warpId?: number;
  readonly occurrences?: number;
  readonly warpIds?: readonly number[];
  readonly cause?: string;
}

function formatMessage(message: string, context?: LevelErrorContext): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class LevelError extends Error {
  readonly code: LevelErrorCode;
  readonly context?: LevelErrorContext;

  constructor(code: LevelErrorCode, message: string, context?: LevelErrorContext) {
    super(formatMessage(message, context));
    this.name = 'LevelError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

/**
 * Raised when an upstream stage broke a guarantee a later stage relies on.
 * Never produced by malformed input; it signals a bug in the pipeline.
 */
export class LevelInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LevelInvariantError';
  }
}

export function createLevelError(code: LevelErrorCode, message: string, context?: LevelErrorContext): LevelError {
  return new LevelError(code, message, context);
}

export function fileReadError(path: string, cause: unknown): LevelError {
  return createLevelError('FILE_READ', `Failed to read level file ${path}.`, {
    path,
    cause: cause instanceof Error ? cause.message : String(cause),
  });
}

export function levelEmptyError(): LevelError {
  return createLevelError('LEVEL_EMPTY', 'Level file empty or width 0.');
}

export function levelNotRectangularError(row: number, rowWidth: number, width: number): LevelError {
  return createLevelError('LEVEL_NOT_RECTANGULAR', `Level not rectangular: row ${row} has ${rowWidth} columns, expected ${width}.`, {
    row,
    rowWidth,
    width,
  });
}

export function noGhostSpawnError(): LevelError {
  return createLevelError('NO_GHOST_SPAWN', "Couldn't locate a ghost spawn.");
}

export function multipleGhostSpawnsError(first: Coordinate, second: Coordinate): LevelError {
  return createLevelError(
    'MULTIPLE_GHOST_SPAWNS',
    `Found multiple ghost spawns at (${first.x}, ${first.y}) and (${second.x}, ${second.y}).`,
    { cell: second },
  );
}

export function invalidGhostSpawnError(cell: Coordinate): LevelError {
  return createLevelError('INVALID_GHOST_SPAWN', `Stray ghost spawn marker at (${cell.x}, ${cell.y}).`, { cell });
}

export function invalidGhostSpawnPeripheralError(cell: Coordinate): LevelError {
  return createLevelError(
    'INVALID_GHOST_SPAWN_PERIPHERAL',
    `Cell (${cell.x}, ${cell.y}) above or below the ghost spawn center must be open space.`,
    { cell },
  );
}

export function noPacSpawnError(): LevelError {
  return createLevelError('NO_PAC_SPAWN', "Couldn't locate a Pac-Man spawn.");
}

export function multiplePacSpawnsError(first: Coordinate, second: Coordinate): LevelError {
  return createLevelError(
    'MULTIPLE_PAC_SPAWNS',
    `Found multiple Pac-Man spawns at (${first.x}, ${first.y}) and (${second.x}, ${second.y}).`,
    { cell: second },
  );
}

export function invalidPacSpawnError(cell: Coordinate): LevelError {
  return createLevelError('INVALID_PAC_SPAWN', `Stray Pac-Man spawn marker at (${cell.x}, ${cell.y}).`, { cell });
}

export function invalidWarpError(message: string, context: LevelErrorContext): LevelError {
  return createLevelError('INVALID_WARP', message, context);
}

export function invalidCharactersError(char: string, cell: Coordinate): LevelError {
  return createLevelError('INVALID_CHARACTERS', `Invalid character ${JSON.stringify(char)} at (${cell.x}, ${cell.y}).`, {
    char,
    cell,
  });
}

export function isLevelError(error: unknown): error is LevelError {
  return error instanceof LevelError;
}

export function isLevelErrorCode<C extends LevelErrorCode>(
  error: unknown,
  code: C,
): error is LevelError & { readonly code: C } {
  return isLevelError(error) && error.code === code;
}
