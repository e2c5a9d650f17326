import winston from 'winston';
import config from '../config/index.js';

const logger = winston.createLogger({
  level: config.logging.level === 'silent' ? 'error' : config.logging.level,
  silent: config.logging.level === 'silent',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'oasis-control' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
    }),
  ],
});

/**
 * Child logger tagged with the module that writes through it.
 */
export function getLogger(module: string): winston.Logger {
  return logger.child({ module });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
