import { Request, Response, NextFunction } from 'express';
import { isAppError } from '../errors/AppError';
import { DecryptionError } from '../errors/relay.errors';
import { logger } from '../utils/logger';

export interface ErrorHandlerOptions {
  isDev: boolean;
}

const CLIENT_ERROR_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  406: 'NOT_ACCEPTABLE',
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

/** Status set by Express or body-parser on their own errors (`res.format`, size limit). */
function clientErrorStatus(err: Error): number | undefined {
  const status =
    'status' in err && typeof err.status === 'number'
      ? err.status
      : 'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : undefined;
  return status !== undefined && status >= 400 && status < 500 ? status : undefined;
}

export function createErrorHandler({ isDev }: ErrorHandlerOptions) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    if (res.headersSent) {
      logger.error('Response already sent, cannot send error response', err, { path: req.path });
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Request body is not valid JSON', code: 'INVALID_JSON' });
      return;
    }

    if (isAppError(err)) {
      if (err instanceof DecryptionError || err.statusCode >= 500) {
        logger.error('Request failed', err, { method: req.method, path: req.path, code: err.code });
      } else {
        logger.warn('Request rejected', { method: req.method, path: req.path, code: err.code });
      }
      const body: Record<string, unknown> = {
        error: err.message,
        ...(err.code ? { code: err.code } : {}),
        ...err.details,
      };
      if (isDev && err.stack && err.statusCode >= 500) {
        body.stack = err.stack;
      }
      res.status(err.statusCode).json(body);
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== undefined) {
      const code = CLIENT_ERROR_CODES[status] ?? `HTTP_${status}`;
      logger.warn('Request rejected', { method: req.method, path: req.path, code });
      res.status(status).json({ error: err.message, code });
      return;
    }

    logger.error('Unhandled error', err, { method: req.method, path: req.path });
    res.status(500).json({
      error: 'Internal Server Error',
      message: isDev ? err.message : 'Something went wrong',
      ...(isDev && err.stack ? { stack: err.stack } : {}),
    });
  };
}
