import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

// Route morgan output through winston at http level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Health probes are polled constantly; tests stay quiet
const skip = (req: { url?: string }): boolean =>
  env.NODE_ENV === 'test' || (req.url ?? '').includes('/health/live');

export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
  stream,
  skip,
});

export default requestLogger;
