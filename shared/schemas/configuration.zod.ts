import { z } from 'zod';

// ============================================================
// Enums
// ============================================================

export const ConfigurationValueTypeEnum = z.enum(['string', 'integer', 'boolean', 'float']);

export const SettingSourceEnum = z.enum(['override', 'environment', 'default', 'none']);

// ============================================================
// Configuration values
// ============================================================

export const ConfigurationValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const EffectiveSettingSchema = z.object({
  key: z.string(),
  type: ConfigurationValueTypeEnum,
  value: ConfigurationValueSchema.nullable(),
  source: SettingSourceEnum,
});

export const SetConfigurationRequestSchema = z.object({
  value: ConfigurationValueSchema,
});

// ============================================================
// Filename parsing
// ============================================================

export const FilenameTransformSchema = z.object({
  pattern: z.string().min(1),
  repl: z.string(),
});

export const FilenameTransformListSchema = z.array(FilenameTransformSchema);

export const ParseFilenameRequestSchema = z.object({
  filename: z.string(),
});

export const ParsedFilenameResponseSchema = z.object({
  created: z.string().datetime().nullable(),
  title: z.string(),
  correspondent: z.string().nullable(),
  tags: z.array(z.string()),
  extension: z.string().nullable(),
});

// ============================================================
// Type Exports
// ============================================================

export type ConfigurationValueType = z.infer<typeof ConfigurationValueTypeEnum>;
export type SettingSource = z.infer<typeof SettingSourceEnum>;
export type ConfigurationValue = z.infer<typeof ConfigurationValueSchema>;
export type EffectiveSetting = z.infer<typeof EffectiveSettingSchema>;
export type SetConfigurationRequest = z.infer<typeof SetConfigurationRequestSchema>;
export type FilenameTransform = z.infer<typeof FilenameTransformSchema>;
export type ParseFilenameRequest = z.infer<typeof ParseFilenameRequestSchema>;
export type ParsedFilenameResponse = z.infer<typeof ParsedFilenameResponseSchema>;
