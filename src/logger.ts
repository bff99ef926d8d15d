/**
 * Winston logger creation, one named logger per module
 */
import * as winston from 'winston';

function getLogLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;

  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

export function createLogger(module: string): winston.Logger {
  const isDevelopment = (process.env.NODE_ENV || 'development') === 'development';

  return winston.createLogger({
    level: getLogLevel(),
    defaultMeta: { service: 'bookwright', module },
    format: isDevelopment
      ? winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp({ format: 'HH:mm:ss' }),
          winston.format.printf(({ level, message, timestamp, module: name }) => `${timestamp} ${level} [${name}] ${message}`)
        )
      : winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json()),
    transports: [new winston.transports.Console()],
  });
}

const loggers = new Map<string, winston.Logger>();

export function getLogger(module: string): winston.Logger {
  let logger = loggers.get(module);
  if (!logger) {
    logger = createLogger(module);
    loggers.set(module, logger);
  }
  return logger;
}
