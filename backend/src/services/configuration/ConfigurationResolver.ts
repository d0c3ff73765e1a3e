import type {
  ConfigurationValue,
  ConfigurationValueType,
  EffectiveSetting,
} from '@docshelf/shared/schemas/configuration.zod';
import { ENV_OVERRIDE_PREFIX } from '../../config/env';
import { TypeMismatchError, UnknownKeyError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import {
  CONFIGURATION_KEYS,
  getRegistryEntry,
  isConfigurationKey,
  type ConfigurationKey,
} from './ConfigurationRegistry';
import { SqliteOptionStore, type OptionStore } from './OptionStore';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRUE_STRINGS = ['true', '1', 'yes'];
const FALSE_STRINGS = ['false', '0', 'no'];

function coerceStoredValue(type: ConfigurationValueType, raw: string): ConfigurationValue | undefined {
  switch (type) {
    case 'string':
      return raw;
    case 'integer': {
      const trimmed = raw.trim();
      if (!INTEGER_PATTERN.test(trimmed)) {
        return undefined;
      }
      const parsed = Number.parseInt(trimmed, 10);
      return Number.isSafeInteger(parsed) ? parsed : undefined;
    }
    case 'float': {
      const trimmed = raw.trim();
      const parsed = Number(trimmed);
      return trimmed !== '' && Number.isFinite(parsed) ? parsed : undefined;
    }
    case 'boolean': {
      const lower = raw.trim().toLowerCase();
      if (TRUE_STRINGS.includes(lower)) {
        return true;
      }
      if (FALSE_STRINGS.includes(lower)) {
        return false;
      }
      return undefined;
    }
  }
}

export function matchesDeclaredType(type: ConfigurationValueType, value: unknown): value is ConfigurationValue {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'boolean':
      return typeof value === 'boolean';
    case 'integer':
      return typeof value === 'number' && Number.isSafeInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
  }
}

export function environmentVariableName(key: string): string {
  return `${ENV_OVERRIDE_PREFIX}${key}`;
}

/**
 * Resolves configuration values from, in order: a stored override, a
 * DOCSHELF_-prefixed environment variable, the registry default.
 *
 * Environment values are returned as the raw string even for non-string
 * keys. Nothing is cached; every call reads the store and the environment.
 */
export class ConfigurationResolver {
  constructor(
    private store: OptionStore,
    private env: NodeJS.ProcessEnv = process.env
  ) {}

  async resolve(key: string): Promise<EffectiveSetting> {
    if (!isConfigurationKey(key)) {
      throw new UnknownKeyError(key);
    }
    return this.resolveKnown(key);
  }

  /**
   * Unlike set(), an unknown key is not an error here: it resolves to null.
   */
  async get(key: string): Promise<ConfigurationValue | null> {
    if (!isConfigurationKey(key)) {
      logger.warn(`Requested unknown configuration key ${key}`);
      return null;
    }
    const setting = await this.resolveKnown(key);
    return setting.value;
  }

  async list(): Promise<EffectiveSetting[]> {
    return Promise.all(CONFIGURATION_KEYS.map((key) => this.resolveKnown(key)));
  }

  async set(key: string, value: unknown): Promise<void> {
    if (!isConfigurationKey(key)) {
      throw new UnknownKeyError(key);
    }

    const { type } = getRegistryEntry(key);
    if (!matchesDeclaredType(type, value)) {
      throw new TypeMismatchError(key, type, value);
    }

    await this.store.write(key, String(value));
    logger.info(`Configuration option ${key} updated`);
  }

  private async resolveKnown(key: ConfigurationKey): Promise<EffectiveSetting> {
    const entry = getRegistryEntry(key);

    const stored = await this.store.read(key);
    if (stored) {
      const coerced = coerceStoredValue(entry.type, stored);
      if (coerced !== undefined) {
        return { key, type: entry.type, value: coerced, source: 'override' };
      }
      logger.warn(`Ignoring stored value for ${key}: not a valid ${entry.type}`);
    }

    const fromEnvironment = this.env[environmentVariableName(key)];
    if (fromEnvironment !== undefined) {
      return { key, type: entry.type, value: fromEnvironment, source: 'environment' };
    }

    if (entry.default !== undefined && entry.default !== null) {
      return { key, type: entry.type, value: entry.default, source: 'default' };
    }

    return { key, type: entry.type, value: null, source: 'none' };
  }
}

let resolver: ConfigurationResolver | null = null;

export function getConfigurationResolver(): ConfigurationResolver {
  if (!resolver) {
    resolver = new ConfigurationResolver(new SqliteOptionStore());
  }
  return resolver;
}
