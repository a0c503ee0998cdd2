import type { Diagnostic } from './diagnostics.js';
import type { LevelError, LevelErrorCode } from './level-error.js';

export type LevelDiagnosticCode = `LEVEL_${LevelErrorCode}`;

const LEVEL_ERROR_SUGGESTIONS: Readonly<Record<LevelErrorCode, string>> = {
  FILE_READ: 'Check that the level file exists and is readable.',
  LEVEL_EMPTY: 'Level files must contain at least one non-empty row; remove leading blank lines.',
  LEVEL_NOT_RECTANGULAR: 'Pad every row to the same number of columns.',
  NO_GHOST_SPAWN: 'Add one solid 8-wide by 5-tall block of "@" for the ghost pen.',
  MULTIPLE_GHOST_SPAWNS: 'Keep a single 8x5 "@" block; only one ghost pen is allowed.',
  INVALID_GHOST_SPAWN: 'Use "@" only inside one solid 8-wide by 5-tall rectangle.',
  INVALID_GHOST_SPAWN_PERIPHERAL:
    'Leave the two cells above and the two cells below the center of the ghost pen as spaces for ghost and fruit spawning.',
  NO_PAC_SPAWN: 'Add one horizontal "$$" pair for the Pac-Man spawn.',
  MULTIPLE_PAC_SPAWNS: 'Keep a single "$$" pair; only one Pac-Man spawn is allowed.',
  INVALID_PAC_SPAWN: 'Use "$" only as one horizontal pair.',
  INVALID_WARP: 'Use each warp digit exactly twice, numbering warps contiguously from 1.',
  INVALID_CHARACTERS: 'Use only " ", "#", "-", "!", "$", "@" and the digits 1-9.',
};

export function levelDiagnosticCode(code: LevelErrorCode): LevelDiagnosticCode {
  return `LEVEL_${code}`;
}

function diagnosticPath(error: LevelError): string {
  if (error.code === 'FILE_READ') {
    return 'level.file';
  }
  const cell = error.context?.cell;
  if (cell !== undefined) {
    return `level.grid[${cell.y}][${cell.x}]`;
  }
  const row = error.context?.row;
  if (row !== undefined) {
    return `level.grid[${row}]`;
  }
  return 'level.grid';
}

export function toLevelDiagnostic(error: LevelError, sourceId?: string): Diagnostic {
  return {
    code: levelDiagnosticCode(error.code),
    path: diagnosticPath(error),
    severity: 'error',
    message: error.message,
    suggestion: LEVEL_ERROR_SUGGESTIONS[error.code],
    ...(sourceId === undefined ? {} : { sourceId }),
  };
}
