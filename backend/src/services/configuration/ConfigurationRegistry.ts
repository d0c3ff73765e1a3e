import type {
  ConfigurationValue,
  ConfigurationValueType,
} from '@docshelf/shared/schemas/configuration.zod';

export interface RegistryEntry {
  type: ConfigurationValueType;
  default?: ConfigurationValue | null;
}

/**
 * Every configuration key the application recognises, with its declared
 * type and compiled-in default. Entries without a default resolve to null
 * when neither an override nor an environment variable is present.
 */
export const CONFIGURATION_REGISTRY = Object.freeze({
  OCR_LANGUAGE: { type: 'string', default: 'eng' },
  OCR_MODE: { type: 'string', default: 'skip' },
  OCR_SKIP_ARCHIVE_FILE: { type: 'string', default: 'never' },
  OCR_CLEAN: { type: 'string', default: 'clean' },
  OCR_DESKEW: { type: 'boolean', default: true },
  OCR_ROTATE_PAGES: { type: 'boolean', default: true },
  OCR_ROTATE_PAGES_THRESHOLD: { type: 'float', default: 12 },
  OCR_OUTPUT_TYPE: { type: 'string', default: 'pdfa' },
  OCR_PAGES: { type: 'integer', default: 0 },
  OCR_IMAGE_DPI: { type: 'integer' },
  OCR_MAX_IMAGE_PIXELS: { type: 'float' },
  OCR_COLOR_CONVERSION_STRATEGY: { type: 'string', default: 'RGB' },
  OCR_USER_ARGS: { type: 'string' },
  NUMBER_OF_SUGGESTED_DATES: { type: 'integer', default: 3 },
  IGNORE_DATES: { type: 'string', default: '' },
  DATE_ORDER: { type: 'string', default: 'DMY' },
} satisfies Record<string, RegistryEntry>);

export type ConfigurationKey = keyof typeof CONFIGURATION_REGISTRY;

export const CONFIGURATION_KEYS = Object.keys(CONFIGURATION_REGISTRY).filter(isConfigurationKey);

export function isConfigurationKey(key: string): key is ConfigurationKey {
  return Object.prototype.hasOwnProperty.call(CONFIGURATION_REGISTRY, key);
}

export function getRegistryEntry(key: ConfigurationKey): RegistryEntry {
  return CONFIGURATION_REGISTRY[key];
}
