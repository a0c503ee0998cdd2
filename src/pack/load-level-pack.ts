import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parseDocument } from 'yaml';

import type { Diagnostic } from '../level/diagnostics.js';
import { toLevelDiagnostic } from '../level/level-diagnostics.js';
import { loadLevelFile } from '../level/load-level-file.js';
import type { Level } from '../level/types.js';
import { LevelPackManifestSchema, type LevelPackManifest } from './level-pack-schema.js';

export interface LoadedPackLevel {
  readonly id: string;
  readonly path: string;
  readonly level: Level;
}

export interface LevelPack {
  readonly manifestPath: string;
  readonly manifest: LevelPackManifest;
  readonly levels: readonly LoadedPackLevel[];
}

export interface LoadLevelPackResult {
  readonly pack: LevelPack | null;
  readonly diagnostics: readonly Diagnostic[];
}

export function loadLevelPackFromFile(manifestPath: string): LoadLevelPackResult {
  const sourceResult = readManifestSource(manifestPath);
  if (sourceResult.diagnostic !== undefined) {
    return { pack: null, diagnostics: [sourceResult.diagnostic] };
  }

  const manifestResult = LevelPackManifestSchema.safeParse(sourceResult.value);
  if (!manifestResult.success) {
    return {
      pack: null,
      diagnostics: manifestResult.error.issues.map((issue): Diagnostic => ({
        code: 'LEVEL_PACK_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `pack.${issue.path.join('.')}` : 'pack',
        severity: 'error',
        message: issue.message,
        sourceId: manifestPath,
      })),
    };
  }

  const manifest = manifestResult.data;
  const baseDir = dirname(manifestPath);
  const levels: LoadedPackLevel[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const entry of manifest.levels) {
    const levelPath = resolve(baseDir, entry.file);
    const result = loadLevelFile(levelPath);
    if (result.ok) {
      levels.push({ id: entry.id, path: levelPath, level: result.level });
      continue;
    }

    const diagnostic = toLevelDiagnostic(result.error, entry.id);
    console.warn(`Skipping level "${entry.id}" from ${manifestPath}.`, diagnostic);
    diagnostics.push(diagnostic);
  }

  return {
    pack: { manifestPath, manifest, levels },
    diagnostics,
  };
}

function readManifestSource(manifestPath: string): { readonly value: unknown; readonly diagnostic?: Diagnostic } {
  let source: string;
  try {
    source = readFileSync(manifestPath, 'utf8');
  } catch (error) {
    return { value: null, diagnostic: parseErrorDiagnostic(manifestPath, `Failed to read level pack manifest: ${formatError(error)}.`) };
  }

  const doc = parseDocument(source, {
    schema: 'core',
    strict: true,
    uniqueKeys: true,
  });
  const firstError = doc.errors[0];
  if (firstError !== undefined) {
    const line = firstError.linePos?.[0]?.line;
    const message =
      line !== undefined
        ? `YAML parse error at line ${line}: ${firstError.message}`
        : `YAML parse error: ${firstError.message}`;
    return { value: null, diagnostic: parseErrorDiagnostic(manifestPath, message) };
  }

  return { value: doc.toJSON() };
}

function parseErrorDiagnostic(manifestPath: string, message: string): Diagnostic {
  return {
    code: 'LEVEL_PACK_PARSE_ERROR',
    path: 'pack.file',
    severity: 'error',
    message,
    suggestion: 'Fix the manifest file and try loading again.',
    sourceId: manifestPath,
  };
}

function formatError(error: unknown): string {
  if (error instanceof Error && error.message.trim() !== '') {
    return error.message;
  }
  return String(error);
}
