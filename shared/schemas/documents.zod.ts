import { z } from 'zod';

export const ARCHIVE_SERIAL_NUMBER_MIN = 0;
export const ARCHIVE_SERIAL_NUMBER_MAX = 0xffffffff;

// ============================================================
// Enums
// ============================================================

export const StorageTypeEnum = z.enum(['unencrypted', 'gpg']);

export const SanityLevelEnum = z.enum(['info', 'warning', 'error']);

// ============================================================
// Core Entities
// ============================================================

export const DocumentSchema = z.object({
  title: z.string().max(128),
  correspondent: z.string().nullable(),
  mime_type: z.string(),
  checksum: z.string().max(32),
  archive_checksum: z.string().max(32).nullable(),
  storage_type: StorageTypeEnum,
  created: z.string().datetime(),
  added: z.string().datetime(),
  modified: z.string().datetime(),
  filename: z.string().max(1024).nullable(),
  archive_filename: z.string().max(1024).nullable(),
  original_filename: z.string().max(1024).nullable(),
  archive_serial_number: z
    .number()
    .int()
    .min(ARCHIVE_SERIAL_NUMBER_MIN)
    .max(ARCHIVE_SERIAL_NUMBER_MAX)
    .nullable(),
});

export const SanityMessageSchema = z.object({
  level: SanityLevelEnum,
  documentId: z.number().int().nullable(),
  message: z.string(),
});

export const SanityReportSchema = z.object({
  messages: z.array(SanityMessageSchema),
});

// ============================================================
// Maintenance
// ============================================================

export const ArchiveRequestSchema = z.object({
  documentId: z.number().int().positive().optional(),
  overwrite: z.boolean().default(false),
});

export const ArchiveSummarySchema = z.object({
  archived: z.array(z.number().int()),
  skipped: z.array(z.number().int()),
  failed: z.array(
    z.object({
      documentId: z.number().int(),
      error: z.string(),
    })
  ),
});

// ============================================================
// Type Exports
// ============================================================

export type StorageType = z.infer<typeof StorageTypeEnum>;
export type SanityLevel = z.infer<typeof SanityLevelEnum>;
export type Document = z.infer<typeof DocumentSchema>;
export type SanityMessage = z.infer<typeof SanityMessageSchema>;
export type SanityReport = z.infer<typeof SanityReportSchema>;
export type ArchiveSummary = z.infer<typeof ArchiveSummarySchema>;
