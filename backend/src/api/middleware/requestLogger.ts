import { Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger';

const HTTP_ERROR_THRESHOLD = 400;
const COLOR_RED = '\x1b[31m';
const COLOR_GREEN = '\x1b[32m';
const COLOR_RESET = '\x1b[0m';

function formatTimestamp(): string {
  return new Date().toISOString();
}

function getStatusColor(statusCode: number): string {
  return statusCode >= HTTP_ERROR_THRESHOLD ? COLOR_RED : COLOR_GREEN;
}

function formatStatusCode(statusCode: number): string {
  const color = getStatusColor(statusCode);
  return `${color}${statusCode}${COLOR_RESET}`;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  logger.debug(`[${formatTimestamp()}] ${req.method} ${req.path}`);

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const formattedStatus = formatStatusCode(res.statusCode);

    logger.info(
      `[${formatTimestamp()}] ${req.method} ${req.path} ${formattedStatus} - ${duration}ms`
    );
  });

  next();
}
