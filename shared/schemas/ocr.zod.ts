import { z } from 'zod';

// ============================================================
// Settings
// ============================================================

// OCR_USER_ARGS holds a JSON object of extra tool arguments, e.g.
// {"deskew": true, "optimize": 1}
export const OcrUserArgsSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const OcrSettingsSchema = z.object({
  pages: z.number().int().nonnegative().nullable(),
  language: z.string(),
  outputType: z.string(),
  mode: z.string(),
  skipArchiveFile: z.string(),
  imageDpi: z.number().int().positive().nullable(),
  clean: z.string(),
  deskew: z.boolean(),
  rotate: z.boolean(),
  rotateThreshold: z.number(),
  maxImagePixels: z.number().nullable(),
  colorConversionStrategy: z.string(),
  userArgs: OcrUserArgsSchema.nullable(),
});

// ============================================================
// Results
// ============================================================

export const OcrPageSchema = z.object({
  page: z.number().int().positive(),
  text: z.string(),
  confidence: z.number().min(0).max(1),
});

export const OcrResultSchema = z.object({
  language: z.string(),
  pages: z.array(OcrPageSchema),
  failedPages: z.array(
    z.object({
      page: z.number().int().positive(),
      error: z.string(),
    })
  ),
});

// ============================================================
// Type Exports
// ============================================================

export type OcrSettings = z.infer<typeof OcrSettingsSchema>;
export type OcrUserArgs = z.infer<typeof OcrUserArgsSchema>;
export type OcrPage = z.infer<typeof OcrPageSchema>;
export type OcrResult = z.infer<typeof OcrResultSchema>;
