import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config } from '../config';

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const logsDir = path.join(process.cwd(), 'logs');
const combinedLogPath = config.logging.file
  ? path.resolve(config.logging.file)
  : path.join(logsDir, 'isola.log');

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = 'isola';
  }

  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (file transports, and stderr when asked).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable stderr output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

function buildTransports(): winston.transport[] {
  // Tests run silent and must not leave log files behind.
  if (config.isTest) {
    return [new winston.transports.Console({ silent: true })];
  }

  for (const dir of new Set([logsDir, path.dirname(combinedLogPath)])) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const transports: winston.transport[] = [
    // File transport for errors - always use JSON format
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: combinedLogPath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ];

  // stdout belongs to the game screen, so console logging goes to stderr.
  if (config.logging.toConsole) {
    transports.push(
      new winston.transports.Console({
        format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  return transports;
}

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: 'isola',
    environment: config.nodeEnv,
  },
  transports: buildTransports(),
});

// ============================================================================
// Exports
// ============================================================================

export { logger };
