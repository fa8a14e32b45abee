import path from 'path';
import winston from 'winston';
import chalk from 'chalk';

const { combine, timestamp, printf, colorize } = winston.format;

const level = process.env.LOG_LEVEL || 'info';
const logDir = process.env.LOG_DIR || 'logs';
const silent = level === 'silent';

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, boutId, component, ...meta }) => {
  const ts = chalk.gray(`[${String(timestamp)}]`);
  const comp = component ? chalk.cyan(`[${String(component)}]`) : '';
  const bout = boutId ? chalk.yellow(`[${String(boutId)}]`) : '';
  const metaStr = Object.keys(meta).length ? chalk.gray(` ${JSON.stringify(meta)}`) : '';

  return `${ts} ${level} ${comp}${bout} ${String(message)}${metaStr}`;
});

export const logger = winston.createLogger({
  level: silent ? 'error' : level,
  silent,
  format: combine(
    timestamp({ format: 'HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true })
  ),
  transports: silent
    ? [new winston.transports.Console({ silent: true })]
    : [
      new winston.transports.Console({
        format: combine(
          colorize({ all: true }),
          consoleFormat
        )
      }),
      // Replay warnings are worth keeping after the process exits
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        format: combine(
          timestamp(),
          winston.format.json()
        )
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        format: combine(
          timestamp(),
          winston.format.json()
        )
      })
    ]
});

export type ComponentLogger = ReturnType<typeof createLogger>;

// Helper to create component-specific loggers
export function createLogger(component: string) {
  return {
    debug: (message: string, meta?: Record<string, unknown>) =>
      logger.debug(message, { component, ...meta }),
    info: (message: string, meta?: Record<string, unknown>) =>
      logger.info(message, { component, ...meta }),
    warn: (message: string, meta?: Record<string, unknown>) =>
      logger.warn(message, { component, ...meta }),
    error: (message: string, meta?: Record<string, unknown>) =>
      logger.error(message, { component, ...meta }),
    bout: (boutId: string, message: string, meta?: Record<string, unknown>) =>
      logger.warn(message, { component, boutId, ...meta })
  };
}

export default logger;
