import type { ConfigurationValue } from '@docshelf/shared/schemas/configuration.zod';
import {
  OcrSettingsSchema,
  OcrUserArgsSchema,
  type OcrSettings,
  type OcrUserArgs,
} from '@docshelf/shared/schemas/ocr.zod';
import { ConfigurationError } from '../../utils/errors';
import type { ConfigurationKey } from '../configuration/ConfigurationRegistry';
import { getConfigurationResolver, type ConfigurationResolver } from '../configuration/ConfigurationResolver';

const TRUE_STRINGS = ['true', 't', 'yes', 'y', '1'];

type Value = ConfigurationValue | null;

// Values read from the environment arrive as strings, whatever the key's type.

function toOptionalInteger(key: ConfigurationKey, value: Value): number | null {
  if (value === null || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${key} must be an integer, got ${String(value)}`);
  }
  return parsed;
}

function toOptionalFloat(key: ConfigurationKey, value: Value): number | null {
  if (value === null || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got ${String(value)}`);
  }
  return parsed;
}

function toBoolean(value: Value): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  return value !== null && TRUE_STRINGS.includes(String(value).trim().toLowerCase());
}

function toText(key: ConfigurationKey, value: Value): string {
  if (value === null) {
    throw new ConfigurationError(`${key} has no value`);
  }
  return String(value);
}

function required<T>(key: ConfigurationKey, value: T | null): T {
  if (value === null) {
    throw new ConfigurationError(`${key} has no value`);
  }
  return value;
}

export function parseUserArgs(value: Value): OcrUserArgs | null {
  if (value === null || value === '') {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(String(value));
  } catch {
    throw new ConfigurationError('OCR_USER_ARGS must be a JSON object');
  }

  const result = OcrUserArgsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError('OCR_USER_ARGS must map argument names to strings, numbers or booleans');
  }
  return result.data;
}

/**
 * Reads every OCR option through the resolver and assembles the bundle
 * handed to the OCR engine.
 */
export async function getOcrSettings(
  resolver: ConfigurationResolver = getConfigurationResolver()
): Promise<OcrSettings> {
  const read = (key: ConfigurationKey) => resolver.get(key);

  const [
    pages,
    language,
    outputType,
    mode,
    skipArchiveFile,
    imageDpi,
    clean,
    deskew,
    rotate,
    rotateThreshold,
    maxImagePixels,
    colorConversionStrategy,
    userArgs,
  ] = await Promise.all([
    read('OCR_PAGES'),
    read('OCR_LANGUAGE'),
    read('OCR_OUTPUT_TYPE'),
    read('OCR_MODE'),
    read('OCR_SKIP_ARCHIVE_FILE'),
    read('OCR_IMAGE_DPI'),
    read('OCR_CLEAN'),
    read('OCR_DESKEW'),
    read('OCR_ROTATE_PAGES'),
    read('OCR_ROTATE_PAGES_THRESHOLD'),
    read('OCR_MAX_IMAGE_PIXELS'),
    read('OCR_COLOR_CONVERSION_STRATEGY'),
    read('OCR_USER_ARGS'),
  ]);

  const result = OcrSettingsSchema.safeParse({
    pages: toOptionalInteger('OCR_PAGES', pages),
    language: toText('OCR_LANGUAGE', language),
    outputType: toText('OCR_OUTPUT_TYPE', outputType),
    mode: toText('OCR_MODE', mode),
    skipArchiveFile: toText('OCR_SKIP_ARCHIVE_FILE', skipArchiveFile),
    imageDpi: toOptionalInteger('OCR_IMAGE_DPI', imageDpi),
    clean: toText('OCR_CLEAN', clean),
    deskew: toBoolean(deskew),
    rotate: toBoolean(rotate),
    rotateThreshold: required(
      'OCR_ROTATE_PAGES_THRESHOLD',
      toOptionalFloat('OCR_ROTATE_PAGES_THRESHOLD', rotateThreshold)
    ),
    maxImagePixels: toOptionalFloat('OCR_MAX_IMAGE_PIXELS', maxImagePixels),
    colorConversionStrategy: toText('OCR_COLOR_CONVERSION_STRATEGY', colorConversionStrategy),
    userArgs: parseUserArgs(userArgs),
  });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid OCR settings: ${details}`);
  }
  return result.data;
}
