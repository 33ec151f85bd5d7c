import pino from 'pino';

const DEFAULT_LEVEL: pino.LevelWithSilent = 'warn';

// stdout carries command output, so every log line goes to stderr.
function createRootLogger(): pino.Logger {
  if (process.env.NODE_ENV === 'development') {
    return pino({
      level: DEFAULT_LEVEL,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ level: DEFAULT_LEVEL }, pino.destination(2));
}

const rootLogger = createRootLogger();

/**
 * Changes the level of the root logger. Child loggers copy the level when
 * they are created, so call this before building clients.
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  rootLogger.level = level;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return rootLogger.child({ ...context });
}
