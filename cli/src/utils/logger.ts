import pino from 'pino';

let logger: pino.Logger | undefined;

export function createLogger(level = process.env.LOG_LEVEL ?? 'info'): pino.Logger {
  if (logger) {
    logger.level = level;
    return logger;
  }

  // Pretty output only for an interactive terminal; piped runs and tests get JSON lines
  const pretty = Boolean(process.stdout.isTTY) && !process.env.VITEST;

  logger = pino({
    level,
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  });

  return logger;
}

export function getLogger(): pino.Logger {
  if (!logger) return createLogger();
  return logger;
}
