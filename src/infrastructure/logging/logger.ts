import pino from 'pino';

const isSilentMode = (): boolean =>
  process.env.CI === 'true' || process.env.NODE_ENV === 'test' || process.env.CSVSED_SILENT === 'true';

// stdout carries CSV, so every log line goes to stderr.
const pretty = process.env.NODE_ENV !== 'test' && process.stderr.isTTY;

const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              destination: 2,
              ignore: 'pid,hostname',
              translateTime: 'SYS:standard',
            },
          },
        }
      : {}),
  },
  pretty ? undefined : pino.destination(2),
);

// Silent mode is checked on every call so tests and CI can toggle it through the environment.
const wrappedLogger = {
  info: (...args: Parameters<typeof logger.info>): void => {
    if (!isSilentMode()) logger.info(...args);
  },
  warn: (...args: Parameters<typeof logger.warn>): void => {
    if (!isSilentMode()) logger.warn(...args);
  },
  error: (...args: Parameters<typeof logger.error>): void => {
    if (!isSilentMode()) logger.error(...args);
  },
  debug: (...args: Parameters<typeof logger.debug>): void => {
    if (!isSilentMode()) logger.debug(...args);
  },
  setLevel: (level: pino.LevelWithSilent): void => {
    logger.level = level;
  },
  isLevelEnabled: (level: string): boolean => !isSilentMode() && logger.isLevelEnabled(level),
  pino: logger,
};

export default wrappedLogger;
