import morgan from 'morgan';
import type { RequestHandler } from 'express';
import type { Logger } from '../utils/logger';

/**
 * Access log lines from morgan, written through winston at `http` level.
 */
export function requestLogger(logger: Logger): RequestHandler {
  return morgan('combined', {
    stream: {
      write: (line: string) => {
        logger.http(line.trim());
      }
    }
  });
}
