import winston from 'winston';
import path from 'path';
import fs from 'fs';

// Credentials that may end up in a log line: config values and Digest headers
export const SENSITIVE_PATTERNS = [
  /password[=:]\s*["']?[^"'\s,]+["']?/gi,
  /token[=:]\s*["']?[\w-]+["']?/gi,
  /secret[=:]\s*["']?[\w-]+["']?/gi,
  /response=\s*"?[0-9a-f]+"?/gi,
];

/**
 * Replace credential values in a log message
 */
export function redact(message: string): string {
  let filtered = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    filtered = filtered.replace(pattern, (match) => {
      const [key] = match.split(/[=:]/);
      return `${key}=***REDACTED***`;
    });
  }
  return filtered;
}

const filterSensitiveData = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redact(info.message);
  }
  return info;
});

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.printf(({ timestamp, level, message, module }) => {
    const modulePrefix = module ? `[${module}]` : '';
    return `${timestamp} ${level} ${modulePrefix} ${message}`;
  })
);

type FileTransport = InstanceType<typeof winston.transports.File>;

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.json()
);

/**
 * Rotating log files, only when LOG_FOLDER is set.
 * collectd starts exec plugins in its own working directory.
 */
function fileTransports(folder: string | undefined): FileTransport[] {
  if (!folder) {
    return [];
  }

  if (!fs.existsSync(folder)) {
    fs.mkdirSync(folder, { recursive: true });
  }

  return [
    new winston.transports.File({
      filename: path.join(folder, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(folder, 'fritzbox.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ];
}

// Every level goes to stderr: stdout carries PUTVAL lines for the exec output
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
    ...fileTransports(process.env.LOG_FOLDER),
  ],
});

export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

export default logger;
