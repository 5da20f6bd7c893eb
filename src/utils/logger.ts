import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { LoggingConfig } from '../config/types';

// Console output goes to stderr so the report on stdout can be piped
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, stack, service, ...meta }) => {
    const scope = service ? ` (${service})` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level}]${scope}: ${stack || message}${metaStr}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'warn',
  defaultMeta: {
    app: 'fido2-audit'
  },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug']
    })
  ]
});

/**
 * Apply the run's logging settings. File transports are only added when a
 * log directory is configured.
 */
export function configureLogger(config: LoggingConfig): void {
  logger.level = config.level;

  if (!config.directory) {
    return;
  }

  const logsDir = path.resolve(config.directory);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'error.log'),
    level: 'error',
    format: fileFormat,
    maxsize: 5242880, // 5MB
    maxFiles: 5
  }));

  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'combined.log'),
    format: fileFormat,
    maxsize: 5242880, // 5MB
    maxFiles: 5
  }));
}

export default logger;
