import winston from 'winston';
import path from 'path';

export type { Logger } from 'winston';

export interface LoggingOptions {
  level: string;
  // `service` label on every entry
  service: string;
  filePath: string;
  production: boolean;
}

const DEFAULT_SERVICE = 'group-digest-bot';
const MAX_LOG_FILE_BYTES = 5 * 1024 * 1024;

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

// Development console: "12:00:00 info [Component] message {meta}"
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, service, component, ...meta }) => {
    const label = component ? `[${String(component)}]` : `[${String(service)}]`;
    const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level} ${label} ${String(message)}${metaString}`;
  }),
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: jsonFormat,
  defaultMeta: { service: DEFAULT_SERVICE },
  silent: process.env.LOG_SILENT === 'true',
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

const rotatingFile = (filename: string, level?: string) =>
  new winston.transports.File({
    filename,
    level,
    maxsize: MAX_LOG_FILE_BYTES,
    maxFiles: 5,
    tailable: true,
  });

/**
 * Applies the loaded configuration. Loggers made by createLogger() before
 * this call pick up the new level and label, since they are children of
 * the root logger.
 */
export function configureLogger(options: LoggingOptions): void {
  logger.level = options.level;
  logger.defaultMeta = { service: options.service };

  logger.clear();
  logger.add(
    new winston.transports.Console({
      format: options.production ? jsonFormat : consoleFormat,
    }),
  );

  if (options.production) {
    logger.add(rotatingFile(path.resolve(options.filePath)));
    logger.add(rotatingFile(path.resolve(path.dirname(options.filePath), 'error.log'), 'error'));
  }
}

/**
 * Child logger tagged with the emitting component
 */
export const createLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};

export default logger;
