import fs from 'fs';
import path from 'path';
import winston from 'winston';

const logsDir = path.join(__dirname, '../../logs');
const silent = process.env.LOG_SILENT === 'true';

if (!silent && !fs.existsSync(logsDir)) {
  fs.mkdirSync(logsDir, { recursive: true });
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

// Console goes to stderr so the CLI can print the artifact path on stdout
const consoleTransport = new winston.transports.Console({
  format: consoleFormat,
  stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
});

const fileTransports = silent
  ? []
  : [
      // Error log file
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      // Combined log file
      new winston.transports.File({
        filename: path.join(logsDir, 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
    ];

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'story-mixer' },
  silent,
  transports: [consoleTransport, ...fileTransports],
});
