import { z } from 'zod';

export const LEVEL_PACK_MANIFEST_VERSION = 1;

export const LevelPackEntrySchema = z
  .object({
    id: z.string().trim().min(1),
    file: z.string().trim().min(1),
  })
  .strict();

export const LevelPackManifestSchema = z
  .object({
    version: z.literal(LEVEL_PACK_MANIFEST_VERSION),
    levels: z.array(LevelPackEntrySchema).min(1),
  })
  .strict()
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.levels.forEach((entry, index) => {
      if (seen.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['levels', index, 'id'],
          message: `Duplicate level id "${entry.id}".`,
        });
      }
      seen.add(entry.id);
    });
  });

export type LevelPackEntry = z.infer<typeof LevelPackEntrySchema>;
export type LevelPackManifest = z.infer<typeof LevelPackManifestSchema>;
