import { pino } from 'pino';
import { env } from './env.js';

const isDevelopment = env.NODE_ENV === 'development';

const level = env.NODE_ENV === 'test' ? 'silent' : isDevelopment ? 'debug' : 'info';

// pino-pretty transport only in development
export const logger = pino({
  level,
  ...(isDevelopment && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export default logger;
