import type { LoggerOptions, LevelWithSilent } from 'pino';

/**
 * Pino logger configuration
 * - Development: Pretty format with trace level
 * - Production: JSON format with info level (or configurable via LOG_LEVEL)
 */

const isDevelopment = process.env.NODE_ENV === 'development';

const LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const fallback: LevelWithSilent = isDevelopment ? 'trace' : 'info';
  if (!value) {
    return fallback;
  }
  const match = LOG_LEVELS.find((level) => level === value.toLowerCase());
  return match ?? fallback;
}

const logLevel = resolveLogLevel(process.env.LOG_LEVEL);

// Pretty printing enabled by default in development, or via LOG_PRETTY env var
const shouldPrettyPrint = process.env.LOG_PRETTY === 'true' || (isDevelopment && process.env.LOG_PRETTY !== 'false');

/**
 * Base Pino configuration
 */
export const loggerConfig: LoggerOptions = {
  level: logLevel,

  base: {
    pid: process.pid,
    hostname: process.env.HOSTNAME || 'unknown',
    env: process.env.NODE_ENV || 'development',
  },

  timestamp: () => `,"time":"${new Date().toISOString()}"`,

  // Upstream credentials must never reach the log sink
  redact: {
    paths: ['password', 'token', 'credentials.password', 'credentials.token', 'headers.authorization', 'headers.cookie'],
    censor: '[REDACTED]',
  },

  ...(shouldPrettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,env',
        singleLine: false,
      },
    },
  }),
};

export const loggingConfig = {
  level: logLevel,
  isDevelopment,
  prettyPrint: shouldPrettyPrint,
};
