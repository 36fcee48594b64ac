import { pino, type Logger } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

export const logger = pino({
  name: 'rpc-connect',
  level: process.env.LOG_LEVEL ?? 'info',
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
        },
      }
    : undefined,
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
