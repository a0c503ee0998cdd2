import { readFileSync } from 'node:fs';

import { fileReadError } from './level-error.js';
import { parseLevel, type LevelParseResult } from './parse-level.js';

export function loadLevelFile(levelPath: string): LevelParseResult {
  let text: string;
  try {
    text = readFileSync(levelPath, 'utf8');
  } catch (error) {
    return { ok: false, error: fileReadError(levelPath, error) };
  }
  return parseLevel(text);
}
