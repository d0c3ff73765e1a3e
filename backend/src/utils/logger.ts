const MASK_SECRETS_DISABLE_VALUE = 'false';
const SECRET_MASK = '********';
const MAX_MASK_DEPTH = 5;

const SENSITIVE_KEYS = ['password', 'passphrase', 'secret', 'token', 'api_key', 'apikey'];

const LEVEL_PRIORITY = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
} as const;

type Level = keyof typeof LEVEL_PRIORITY;

function isLevel(value: string): value is Level {
  return value in LEVEL_PRIORITY;
}

function currentLevel(): Level {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  return isLevel(configured) ? configured : 'info';
}

function isEnabled(level: Level): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel()];
}

function isMaskingEnabled(): boolean {
  return process.env.MASK_SECRETS !== MASK_SECRETS_DISABLE_VALUE;
}

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive));
}

export function maskObject(value: unknown, depth = 0): unknown {
  if (depth > MAX_MASK_DEPTH || value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => maskObject(item, depth + 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    masked[key] = isSensitiveKey(key) && entry !== null && entry !== undefined
      ? SECRET_MASK
      : maskObject(entry, depth + 1);
  }
  return masked;
}

function maskArg(arg: unknown): unknown {
  if (!isMaskingEnabled() || arg instanceof Error) {
    return arg;
  }
  return maskObject(arg);
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (isEnabled('debug')) {
      console.debug(...args.map(maskArg));
    }
  },

  info: (...args: unknown[]) => {
    if (isEnabled('info')) {
      console.info(...args.map(maskArg));
    }
  },

  warn: (...args: unknown[]) => {
    if (isEnabled('warn')) {
      console.warn(...args.map(maskArg));
    }
  },

  error: (...args: unknown[]) => {
    if (isEnabled('error')) {
      console.error(...args.map(maskArg));
    }
  },
};
