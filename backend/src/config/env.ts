import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import {
  FilenameTransformListSchema,
  type FilenameTransform,
} from '@docshelf/shared/schemas/configuration.zod';

const DEFAULT_PORT = 3000;
const DEFAULT_DATABASE_PATH = '../data/db.sqlite';
const DEFAULT_MEDIA_ROOT = '../media';
const DEFAULT_FRONTEND_URL = 'http://localhost:5173';
const DEFAULT_MAX_FILE_SIZE_MB = 50;

/**
 * Prefix of the environment variables that override configuration keys,
 * e.g. DOCSHELF_OCR_LANGUAGE for OCR_LANGUAGE.
 */
export const ENV_OVERRIDE_PREFIX = 'DOCSHELF_';

const LogLevelEnum = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

function parseTransforms(raw: string, ctx: z.RefinementCtx): FilenameTransform[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON array' });
    return z.NEVER;
  }

  const result = FilenameTransformListSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `[${issue.path.join('.')}] ${issue.message}`,
      });
    }
    return z.NEVER;
  }

  for (const transform of result.data) {
    try {
      new RegExp(transform.pattern);
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid regular expression: ${transform.pattern}`,
      });
      return z.NEVER;
    }
  }

  return result.data;
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  DATABASE_PATH: z.string().default(DEFAULT_DATABASE_PATH),
  MEDIA_ROOT: z.string().default(DEFAULT_MEDIA_ROOT),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: LogLevelEnum.default('info'),
  FRONTEND_URL: z.string().default(DEFAULT_FRONTEND_URL),
  MAX_FILE_SIZE_MB: z.coerce.number().int().positive().default(DEFAULT_MAX_FILE_SIZE_MB),
  FILENAME_PARSE_TRANSFORMS: z.string().default('[]').transform(parseTransforms),
  // e.g. "{correspondent}/{title}"; empty keeps the numeric default names
  FILENAME_FORMAT: z.string().default(''),
  PASSPHRASE: z.string().optional(),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}

let config: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (!config) {
    dotenv.config();
    config = parseConfig(process.env);
  }
  return config;
}

/**
 * Resolves a configured path against the backend directory, the way the
 * defaults above are written.
 */
export function resolveFromBackend(configured: string): string {
  return path.isAbsolute(configured)
    ? configured
    : path.resolve(__dirname, '..', '..', configured);
}
