import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { claimCell, isClaimed } from '../../src/level/claim-overlay.js';
import { detectPacSpawn } from '../../src/level/detect-pac-spawn.js';
import { isLevelErrorCode } from '../../src/level/level-error.js';
import { countClaimed, gridWithOverlay } from '../helpers/level-fixtures.js';

describe('detectPacSpawn', () => {
  it('returns the left cell of the horizontal pair and claims both cells', () => {
    const { grid, overlay } = gridWithOverlay(['#####', '# $$#', '#####']);

    assert.deepEqual(detectPacSpawn(grid, overlay), { x: 2, y: 1 });
    assert.equal(isClaimed(overlay, 2, 1), true);
    assert.equal(isClaimed(overlay, 3, 1), true);
    assert.equal(countClaimed(overlay), 2);
  });

  it('fails with NO_PAC_SPAWN when no marker is present', () => {
    const { grid, overlay } = gridWithOverlay(['#####', '#   #', '#####']);

    assert.throws(() => detectPacSpawn(grid, overlay), (error: unknown) => isLevelErrorCode(error, 'NO_PAC_SPAWN'));
  });

  it('fails with INVALID_PAC_SPAWN for a lone marker', () => {
    const { grid, overlay } = gridWithOverlay(['#####', '#$$ #', '#  $#', '#####']);

    assert.throws(
      () => detectPacSpawn(grid, overlay),
      (error: unknown) =>
        isLevelErrorCode(error, 'INVALID_PAC_SPAWN') && error.context?.cell?.x === 3 && error.context.cell.y === 2,
    );
  });

  it('fails with INVALID_PAC_SPAWN for a run of three markers', () => {
    const { grid, overlay } = gridWithOverlay(['#####', '#$$$#', '#####']);

    assert.throws(
      () => detectPacSpawn(grid, overlay),
      (error: unknown) =>
        isLevelErrorCode(error, 'INVALID_PAC_SPAWN') && error.context?.cell?.x === 3 && error.context.cell.y === 1,
    );
  });

  it('does not accept a vertical pair', () => {
    const { grid, overlay } = gridWithOverlay(['#$#', '#$#']);

    assert.throws(
      () => detectPacSpawn(grid, overlay),
      (error: unknown) =>
        isLevelErrorCode(error, 'INVALID_PAC_SPAWN') && error.context?.cell?.x === 1 && error.context.cell.y === 0,
    );
  });

  it('fails with MULTIPLE_PAC_SPAWNS for a run of four markers', () => {
    const { grid, overlay } = gridWithOverlay(['######', '#$$$$#', '######']);

    assert.throws(
      () => detectPacSpawn(grid, overlay),
      (error: unknown) =>
        isLevelErrorCode(error, 'MULTIPLE_PAC_SPAWNS') && error.context?.cell?.x === 3 && error.context.cell.y === 1,
    );
  });

  it('fails with MULTIPLE_PAC_SPAWNS for pairs on separate rows', () => {
    const { grid, overlay } = gridWithOverlay(['#$$ #', '# $$#']);

    assert.throws(
      () => detectPacSpawn(grid, overlay),
      (error: unknown) =>
        isLevelErrorCode(error, 'MULTIPLE_PAC_SPAWNS') && error.context?.cell?.x === 2 && error.context.cell.y === 1,
    );
  });

  it('skips pairs that an earlier stage already claimed', () => {
    const { grid, overlay } = gridWithOverlay(['#$$ #', '# $$#']);
    claimCell(overlay, 1, 0);
    claimCell(overlay, 2, 0);

    assert.deepEqual(detectPacSpawn(grid, overlay), { x: 2, y: 1 });
  });
});
