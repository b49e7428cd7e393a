import type { ErrorRequestHandler, RequestHandler } from 'express';
import type { Logger } from '../utils/logger';

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({
    error: 'not_found',
    message: `Route ${req.method} ${req.path} not found`
  });
};

// Last-resort handler; everything below /me is supposed to absorb its own failures.
export function errorHandler(logger: Logger, exposeMessage: boolean): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    logger.error('Unhandled error', {
      method: req.method,
      path: req.path,
      error: error instanceof Error ? error.stack ?? error.message : String(error)
    });

    if (res.headersSent) {
      next(error);
      return;
    }

    res.status(500).json({
      error: 'internal_error',
      message: exposeMessage && error instanceof Error ? error.message : 'Something went wrong'
    });
  };
}
