const HTTP_STATUS_BAD_REQUEST = 400;
const HTTP_STATUS_NOT_FOUND = 404;
const HTTP_STATUS_INTERNAL_SERVER_ERROR = 500;

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational = true
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(HTTP_STATUS_NOT_FOUND, message);
  }
}

/**
 * Invalid configuration: a malformed transform list, unparseable
 * OCR_USER_ARGS and the like.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, statusCode = HTTP_STATUS_INTERNAL_SERVER_ERROR) {
    super(statusCode, message);
  }
}

export class UnknownKeyError extends ConfigurationError {
  constructor(public readonly key: string) {
    super(`Unknown configuration key: ${key}`, HTTP_STATUS_NOT_FOUND);
  }
}

export class TypeMismatchError extends ConfigurationError {
  constructor(
    public readonly key: string,
    public readonly expectedType: string,
    public readonly actualValue: unknown
  ) {
    super(
      `Configuration key ${key} expects a value of type ${expectedType}, got ${describeValue(actualValue)}`,
      HTTP_STATUS_BAD_REQUEST
    );
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number' && !Number.isInteger(value)) {
    return `float ${value}`;
  }
  return `${typeof value} ${JSON.stringify(value)}`;
}
