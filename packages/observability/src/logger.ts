import pino from 'pino';

/**
 * Redact sensitive data from logs
 * - Authorization headers (Bearer tokens)
 * - Email addresses from profile payloads
 * - Passwords and other secrets
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'email',
  '*.email',
  'password',
  'token',
  'secret',
];

const BEARER_PREFIX = 'Bearer ';

/**
 * Mask the credential of a Bearer header value
 */
export function redactBearer(value: unknown): unknown {
  if (typeof value === 'string' && value.startsWith(BEARER_PREFIX)) {
    return `${BEARER_PREFIX}[REDACTED]`;
  }
  return value;
}

export type Logger = pino.Logger;

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of sensitive data (credentials, emails)
 * - Request ID correlation support
 * - Structured JSON output
 *
 * Pass `destination` to capture output (tests) instead of writing to stdout.
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      req: (req) => {
        const serialized = pino.stdSerializers.req(req);
        if (serialized.headers) {
          for (const key of Object.keys(serialized.headers)) {
            serialized.headers[key] = String(redactBearer(serialized.headers[key]));
          }
        }
        return serialized;
      },
      res: pino.stdSerializers.res,
      err: pino.stdSerializers.err,
    },
    // Format timestamps as ISO 8601
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}
