import { z } from 'zod';

export const CoordinateSchema = z
  .object({
    x: z.number().int().nonnegative(),
    y: z.number().int().nonnegative(),
  })
  .strict();

export const PositionSchema = z
  .object({
    x: z.number().finite(),
    y: z.number().finite(),
  })
  .strict();

export const WarpIdSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
  z.literal(7),
  z.literal(8),
  z.literal(9),
]);

export const CellCodeSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(-1),
  z.literal(-2),
  z.literal(-3),
  z.literal(-4),
  z.literal(-5),
  z.literal(-6),
  z.literal(-7),
  z.literal(-8),
  z.literal(-9),
]);

export const BoardSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    cells: z.array(z.array(CellCodeSchema)),
  })
  .strict();

export const WarpPairSchema = z
  .object({
    id: WarpIdSchema,
    a: CoordinateSchema,
    b: CoordinateSchema,
  })
  .strict();

export const EntityPositionsSchema = z
  .object({
    pacman: PositionSchema,
    blinky: PositionSchema,
    pinky: PositionSchema,
    inky: PositionSchema,
    clyde: PositionSchema,
  })
  .strict();

export const SerializedLevelSchema = z
  .object({
    board: BoardSchema,
    ghostSpawn: CoordinateSchema,
    pacSpawn: CoordinateSchema,
    warps: z.array(WarpPairSchema).max(9),
    positions: EntityPositionsSchema,
    dotCount: z.number().int().nonnegative(),
    powerPelletCount: z.number().int().nonnegative(),
    lives: z.number().int().nonnegative(),
    points: z.number().int().nonnegative(),
  })
  .strict();

export type SerializedLevel = z.infer<typeof SerializedLevelSchema>;
