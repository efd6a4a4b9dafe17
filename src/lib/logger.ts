import { pino } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, ignore: 'pid,hostname', translateTime: 'HH:MM:ss' },
        },
      }),
});

/**
 * Creates a child logger scoped to a single conversion run.
 */
export function createRunLogger(
  inputPath: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ input: inputPath, ...extra });
}

export default logger;
