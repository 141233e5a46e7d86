/**
 * Request logging and the translation of thrown errors into HTTP responses.
 */

import type { ErrorRequestHandler, RequestHandler } from 'express';
import type { Logger } from './log.js';
import { HttpError, NotFoundError } from './errors.js';

/** Log one line per finished request */
export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const started = process.hrtime.bigint();
    res.on('finish', () => {
      const ms = Number(process.hrtime.bigint() - started) / 1e6;
      logger.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${ms.toFixed(1)}ms`);
    });
    next();
  };
}

/** Fallback for routes nothing else matched */
export const notFoundHandler: RequestHandler = (_req, _res, next) => {
  next(new NotFoundError());
};

/** Errors raised by express.json() carry the parser's `type` and an HTTP status */
function isBodyParserError(err: unknown): err is Error & { type: string; status: number } {
  return err instanceof Error
    && 'type' in err && typeof err.type === 'string'
    && 'status' in err && typeof err.status === 'number';
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof HttpError) {
      res.status(err.status).json(err.toBody());
      return;
    }

    if (isBodyParserError(err)) {
      if (err.type === 'entity.parse.failed') {
        res.status(422).json({
          detail: [{ loc: ['body'], msg: 'Invalid JSON', type: 'json_invalid' }],
        });
        return;
      }
      if (err.status >= 400 && err.status < 500) {
        res.status(err.status).json({ detail: err.message });
        return;
      }
    }

    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
    res.status(500).json({ detail: 'Internal Server Error' });
  };
}
