import type { NextFunction, Request, Response } from 'express';
import { logger } from './logger.js';
import { errorPage } from './views/error.js';

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

// body-parser attaches these to malformed payloads
interface BodyParserError {
  type: string;
  status: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

function wantsJson(req: Request) {
  return req.originalUrl.startsWith('/api');
}

export function notFound(req: Request, _res: Response, next: NextFunction) {
  next(new HttpError(404, wantsJson(req) ? 'Not found' : 'Page not found'));
}

export function createErrorHandler(options: { exposeErrors: boolean }) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    let status = 500;
    let message = 'Server error';

    if (err instanceof HttpError) {
      status = err.status;
      message = err.message;
    } else if (isBodyParserError(err) && err.status < 500) {
      status = err.status;
      message = err.type === 'entity.parse.failed' ? 'Malformed JSON body' : 'Invalid request body';
    } else {
      logger.error('unhandled error', { method: req.method, route: req.originalUrl }, err);
      if (options.exposeErrors && err instanceof Error) message = err.message;
    }

    if (wantsJson(req)) {
      res.status(status).json({ error: message });
      return;
    }
    res.status(status).type('html').send(errorPage({ status, message }));
  };
}
