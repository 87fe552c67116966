import winston from 'winston';
import path from 'path';
import fs from 'fs';

const LOG_DIR = process.env.LOG_DIR || '';

// Ensure log directory exists
const ensureLogDir = (dir: string): boolean => {
  try {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    return true;
  } catch (error) {
    console.error(`Failed to create log directory ${dir}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
};

// Console format
const consoleFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(
    (info: winston.Logform.TransformableInfo) => `${info.timestamp} [${info.level}] ${info.message}`
  )
);

// JSON format for file logs
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json()
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ],
});

const attachedDirs = new Set<string>();

/**
 * Add the combined and error file transports under `dir`.
 * Calling it twice for the same directory is a no-op.
 */
export const enableFileLogging = (dir: string): void => {
  const resolved = path.resolve(dir);
  if (attachedDirs.has(resolved) || !ensureLogDir(resolved)) {
    return;
  }
  attachedDirs.add(resolved);

  // Combined log - all levels
  logger.add(
    new winston.transports.File({
      filename: path.join(resolved, 'combined.log'),
      format: fileFormat,
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    })
  );

  // Error log - errors only
  logger.add(
    new winston.transports.File({
      filename: path.join(resolved, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    })
  );
};

export const setLogLevel = (level: string): void => {
  logger.level = level;
};

if (LOG_DIR) {
  enableFileLogging(LOG_DIR);
}

export default logger;
