import winston from 'winston';
import path from 'path';
import { config } from '../config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const LEVELS = ['error', 'warn', 'info', 'debug'];

// level, message, then any metadata as JSON
const lineFormat = printf(({ level, message, timestamp, service, ...metadata }) => {
  let line = `${timestamp} [${level}] ${service}: ${message}`;

  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }

  return line;
});

const logger = winston.createLogger({
  level: config.logLevel,
  defaultMeta: { service: 'enquiry-mail-ingest' },
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    lineFormat
  ),
  transports: [
    // stdout carries the CLI's JSON result
    new winston.transports.Console({
      stderrLevels: LEVELS,
      format: combine(colorize(), lineFormat),
    }),
  ],
});

if (config.env === 'production') {
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logDir, 'error.log'),
      level: 'error',
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logDir, 'ingest.log'),
    })
  );
}

export default logger;
