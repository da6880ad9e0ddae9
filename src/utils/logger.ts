import { createLogger, format, transports, Logger } from 'winston';
import config from '../config';

const { combine, timestamp, printf, colorize, json, errors } = format;

// Кастомный формат логов для консоли
const consoleFormat = printf(({ level, message, timestamp, ...meta }) => {
  return `${timestamp} [${level}]: ${message} ${
    Object.keys(meta).length ? JSON.stringify(meta, null, 2) : ''
  }`;
});

const isTest = config.server.env === 'test';

const logger: Logger = createLogger({
  level: config.logger.level,
  format: combine(errors({ stack: true }), timestamp(), json()),
  defaultMeta: { service: 'trade-coach-server' },
  silent: isTest,
  exitOnError: false,
});

if (config.logger.toFile && !isTest) {
  logger.add(
    new transports.File({
      filename: config.logger.file.error,
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
  logger.add(
    new transports.File({
      filename: config.logger.file.combined,
      maxsize: 5242880,
      maxFiles: 5,
    })
  );
}

// В режиме разработки (или без файлов) пишем в консоль
if (config.server.env === 'development' || !config.logger.toFile || isTest) {
  logger.add(
    new transports.Console({
      format: combine(colorize(), timestamp(), consoleFormat),
    })
  );
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export default logger;
