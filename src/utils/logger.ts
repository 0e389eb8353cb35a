import winston from 'winston';
import path from 'path';
import { loadLogConfig } from '../config/flowConfig';

const config = loadLogConfig();

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for each level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(colors);

const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`,
  ),
);

const transports: Array<
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance
> = [new winston.transports.Console()];

// File output only when a log directory is configured
if (config.logDir) {
  transports.push(
    new winston.transports.File({
      filename: path.join(config.logDir, 'errors.log'),
      level: 'error',
    }),
    new winston.transports.File({
      filename: path.join(config.logDir, 'combined.log'),
    }),
  );
}

const logger = winston.createLogger({
  level: config.logLevel,
  levels,
  format,
  transports,
  silent: process.env.NODE_ENV === 'test',
});

export default logger;
