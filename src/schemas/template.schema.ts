import { z } from 'zod';

export const ScreenRegionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
});

/**
 * Template metadata as persisted on disk. Image bytes live in a sibling file
 * referenced by `filePath` and are never embedded in the document.
 */
export const TemplateMetadataSchema = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
  filePath: z.string().default(''),
  createdAt: z.string().default(() => new Date().toISOString()),
  captureRegion: ScreenRegionSchema.default({ x: 0, y: 0, width: 0, height: 0 }),
  matchThreshold: z.number().min(0).max(1).default(0.8),
});

export type TemplateMetadata = z.infer<typeof TemplateMetadataSchema>;
