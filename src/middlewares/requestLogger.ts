import { IncomingMessage } from 'http';
import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

// Morgan stream for Winston, at http level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Skip logging in test environment and for liveness probes
const skip = (req: IncomingMessage): boolean => {
  return env.NODE_ENV === 'test' || (req.url ?? '').endsWith('/health/live');
};

// Request logger middleware
export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
  stream,
  skip,
});

export default requestLogger;
