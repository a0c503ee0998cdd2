import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { LevelPackManifestSchema } from '../../src/pack/level-pack-schema.js';

describe('LevelPackManifestSchema', () => {
  it('accepts a versioned list of levels', () => {
    const parsed = LevelPackManifestSchema.safeParse({
      version: 1,
      levels: [
        { id: 'classic', file: '0.lvl' },
        { id: 'tunnels', file: 'tunnels.lvl' },
      ],
    });

    assert.equal(parsed.success, true);
  });

  it('rejects an unsupported version', () => {
    const parsed = LevelPackManifestSchema.safeParse({ version: 2, levels: [{ id: 'classic', file: '0.lvl' }] });

    assert.equal(parsed.success, false);
    assert.deepEqual(parsed.success ? [] : parsed.error.issues.map((issue) => issue.path), [['version']]);
  });

  it('rejects an empty level list and blank fields', () => {
    assert.equal(LevelPackManifestSchema.safeParse({ version: 1, levels: [] }).success, false);
    assert.equal(LevelPackManifestSchema.safeParse({ version: 1, levels: [{ id: ' ', file: '0.lvl' }] }).success, false);
  });

  it('rejects unknown keys', () => {
    const parsed = LevelPackManifestSchema.safeParse({
      version: 1,
      levels: [{ id: 'classic', file: '0.lvl', music: 'theme.ogg' }],
    });

    assert.equal(parsed.success, false);
  });

  it('reports duplicate level ids on the repeated entry', () => {
    const parsed = LevelPackManifestSchema.safeParse({
      version: 1,
      levels: [
        { id: 'classic', file: '0.lvl' },
        { id: 'classic', file: '1.lvl' },
      ],
    });

    assert.equal(parsed.success, false);
    assert.deepEqual(
      parsed.success ? [] : parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
      [{ path: ['levels', 1, 'id'], message: 'Duplicate level id "classic".' }],
    );
  });
});
