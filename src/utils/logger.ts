import winston from 'winston';

/**
 * Serialize an error object to a JSON-friendly format
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    // Copy any additional properties from the error
    for (const [key, value] of Object.entries(error)) {
      if (!(key in serialized)) {
        serialized[key] = value;
      }
    }
    return serialized;
  }
  if (typeof error === 'object' && error !== null) {
    return { ...error };
  }
  return { value: String(error) };
}

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level}]: ${message}${metaStr}`;
  })
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: jsonFormat,
  transports: [
    new winston.transports.Console({
      format: process.env.LOG_FORMAT === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: ['error', 'warn'],
    }),
  ],
});

/**
 * `--verbose` turns on per-record debug output.
 */
export function setVerbose(verbose: boolean): void {
  if (verbose) {
    logger.level = 'debug';
  }
}
