import winston from 'winston';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Winston logger for diagnostics.
 * Everything goes to stderr so stdout stays reserved for the menu and progress line.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'warn',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
  ),
  defaultMeta: { service: 'yt-quality-dl' },
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console({
      stderrLevels: LEVELS,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, service, stack, ...meta }) => {
          let msg = `${timestamp} [${level}]: ${message}`;
          if (Object.keys(meta).length > 0) {
            msg += ` ${JSON.stringify(meta)}`;
          }
          if (typeof stack === 'string') {
            msg += `\n${stack}`;
          }
          return msg;
        }),
      ),
    }),
  ],
});

export function isLogLevel(value: string): boolean {
  return LEVELS.includes(value);
}

/**
 * Apply the level from the loaded config. Unknown names keep the current level.
 */
export function setLogLevel(level: string): void {
  if (isLogLevel(level)) {
    logger.level = level;
  } else {
    logger.warn(`Unknown LOG_LEVEL "${level}", keeping "${logger.level}"`);
  }
}

/**
 * Log an error with its stack trace
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
): void {
  logger.error(error.message, {
    name: error.name,
    stack: error.stack,
    ...context,
  });
}
