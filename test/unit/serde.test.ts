import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { parseLevelOrThrow } from '../../src/level/parse-level.js';
import { deserializeLevel, serializeLevel } from '../../src/level/serde.js';
import { basicLevelText } from '../helpers/level-fixtures.js';

const levelWithWarps = () =>
  parseLevelOrThrow(
    basicLevelText([
      { x: 10, y: 1, char: '2' },
      { x: 1, y: 1, char: '1' },
      { x: 10, y: 6, char: '1' },
      { x: 9, y: 6, char: '2' },
      { x: 9, y: 3, char: '-' },
    ]),
  );

const roundTripJson = (value: unknown): unknown => JSON.parse(JSON.stringify(value));

describe('level serde', () => {
  it('writes warps as an ascending array', () => {
    const serialized = serializeLevel(levelWithWarps());

    assert.deepEqual(serialized.warps, [
      { id: 1, a: { x: 1, y: 1 }, b: { x: 10, y: 6 } },
      { id: 2, a: { x: 10, y: 1 }, b: { x: 9, y: 6 } },
    ]);
    assert.equal(serialized.dotCount, 1);
  });

  it('restores an equal level from JSON', () => {
    const level = levelWithWarps();

    const restored = deserializeLevel(roundTripJson(serializeLevel(level)));

    assert.deepEqual(restored, level);
    assert.deepEqual(serializeLevel(restored), serializeLevel(level));
  });

  it('copies board rows instead of sharing them', () => {
    const level = levelWithWarps();
    const serialized = serializeLevel(level);
    const row = serialized.board.cells[1];
    assert.ok(row !== undefined);
    row[2] = 3;

    assert.equal(level.board.cells[1]?.[2], 0);
  });

  it('rejects values that do not match the schema', () => {
    const serialized = { ...serializeLevel(levelWithWarps()), lives: -1 };

    assert.throws(() => deserializeLevel(serialized), /Invalid serialized level at lives/);
    assert.throws(() => deserializeLevel({ ...serializeLevel(levelWithWarps()), extra: true }), TypeError);
    assert.throws(() => deserializeLevel(null), /Invalid serialized level at level/);
  });

  it('rejects boards whose rows do not match the declared width', () => {
    const serialized = serializeLevel(levelWithWarps());
    const cells = serialized.board.cells.map((row, y) => (y === 1 ? row.slice(1) : row));

    assert.throws(
      () => deserializeLevel({ ...serialized, board: { ...serialized.board, cells } }),
      /board\.cells\[1\]: expected 12 columns, received 11/,
    );
  });

  it('rejects warp endpoints that do not sit on their warp cell', () => {
    const serialized = serializeLevel(levelWithWarps());
    const warps = serialized.warps.map((warp) => (warp.id === 1 ? { ...warp, a: { x: 2, y: 1 } } : warp));

    assert.throws(() => deserializeLevel({ ...serialized, warps }), /warps\[0\]\.a: cell \(2, 1\) is not warp 1/);
  });

  it('rejects duplicate warp ids', () => {
    const serialized = serializeLevel(levelWithWarps());
    const first = serialized.warps[0];
    assert.ok(first !== undefined);

    assert.throws(() => deserializeLevel({ ...serialized, warps: [first, first] }), /warps\[1\]\.id: duplicate warp 1/);
  });

  it('rejects a warp whose two endpoints are the same cell', () => {
    const serialized = serializeLevel(levelWithWarps());
    const warps = serialized.warps.map((warp) => (warp.id === 1 ? { ...warp, b: warp.a } : warp));

    assert.throws(() => deserializeLevel({ ...serialized, warps }), /warps\[0\]\.b: expected \(10, 6\), received \(1, 1\)/);
  });

  it('rejects a warp id that occupies more than two cells', () => {
    const serialized = serializeLevel(levelWithWarps());
    const cells = serialized.board.cells.map((row, y) => (y === 1 ? row.map((code, x) => (x === 2 ? -1 : code)) : row));

    assert.throws(
      () => deserializeLevel({ ...serialized, board: { ...serialized.board, cells } }),
      /warps\[0\]: warp 1 occupies 3 cell\(s\), expected 2/,
    );
  });

  it('rejects warp cells on the board without a warp entry', () => {
    const serialized = serializeLevel(levelWithWarps());

    assert.throws(
      () => deserializeLevel({ ...serialized, warps: [] }),
      /board\.cells\[1\]\[1\]: warp 1 has no entry in warps/,
    );
  });

  it('rejects warp ids that do not run contiguously from 1', () => {
    const serialized = serializeLevel(levelWithWarps());
    const cells = serialized.board.cells.map((row) => row.map((code) => (code === -1 ? 0 : code)));
    const warps = serialized.warps.filter((warp) => warp.id === 2);

    assert.throws(
      () => deserializeLevel({ ...serialized, board: { ...serialized.board, cells }, warps }),
      /Invalid serialized level at warps: ids must run contiguously from 1; found 2/,
    );
  });

  it('rejects spawns that do not fit on the board', () => {
    const serialized = serializeLevel(levelWithWarps());

    assert.throws(
      () => deserializeLevel({ ...serialized, ghostSpawn: { x: 500, y: 500 } }),
      /ghostSpawn: pen at \(500, 500\) does not fit the 12x9 board/,
    );
    assert.throws(
      () => deserializeLevel({ ...serialized, ghostSpawn: { x: 5, y: 2 } }),
      /ghostSpawn: pen at \(5, 2\) does not fit the 12x9 board/,
    );
    assert.throws(
      () => deserializeLevel({ ...serialized, pacSpawn: { x: 11, y: 7 } }),
      /pacSpawn: spawn at \(11, 7\) does not fit the 12x9 board/,
    );
  });
});
