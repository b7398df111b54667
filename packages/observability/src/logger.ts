import { pino, stdSerializers, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Redact sensitive data from logs
 * - Authorization headers echoed back by payment providers
 * - Secrets and API keys passed in collaborator configuration
 */
const REDACTION_PATHS = [
  'authorization',
  'Authorization',
  '*.authorization',
  '*.Authorization',
  'password',
  'secret',
  '*.secret',
  'apiKey',
  '*.apiKey',
];

const BEARER_PATTERN = /Bearer\s+[A-Za-z0-9._~+/=-]+/g;

/**
 * Redact bearer tokens inside free-form strings such as transfer failure reasons
 */
export function redactTokens(value: string): string {
  return value.replace(BEARER_PATTERN, 'Bearer [REDACTED]');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactTokens(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (isPlainObject(value)) {
    return redactRecord(value);
  }
  return value;
}

function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const key of Object.keys(record)) {
    result[key] = redactValue(record[key]);
  }
  return result;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of secrets and bearer tokens
 * - Structured JSON output with ISO timestamps
 *
 * A destination stream may be passed to capture output (tests, log shippers).
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: (object) => redactRecord(object),
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();

/**
 * Child logger whose every line carries the campaign id
 */
export function createCampaignLogger(campaignId: string, parent: Logger = logger): Logger {
  return parent.child({ campaignId });
}
