/**
 * Gateway logging on pino.
 *
 * Every context object passes through `sanitizeForLogging` before it
 * reaches pino, and pino's own redaction covers credential-bearing keys.
 * Request-scoped loggers carry the correlation id via `child()`.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { sanitizeForLogging } from '../utils/crypto.js';
import type { LoggingConfig } from '@keygate/shared';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
  /** X-Request-Id of the request being served */
  correlationId?: string;
  component?: string;
  /** Token subject, once authenticated */
  subject?: string;
  [key: string]: unknown;
}

export interface SecureLogger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): SecureLogger;
  readonly level: LogLevel;
}

const REDACTED_PATHS = [
  'token',
  'secret',
  'authorization',
  'Authorization',
  'cookie',
  'Cookie',
  '*.token',
  '*.secret',
  'headers.authorization',
  'headers.cookie',
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function pinoOptions(config: LoggingConfig): LoggerOptions {
  return {
    level: config.level,
    serializers: { err: pino.stdSerializers.err },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: ({ pid, hostname }) => ({ pid, hostname, name: 'keygate' }),
    },
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
  };
}

// Plain JSON on stdout is pino's default destination and needs no transport.
function transportFor(
  config: LoggingConfig
): pino.TransportMultiOptions | pino.TransportSingleOptions | undefined {
  const targets: pino.TransportTargetOptions[] = [];

  for (const output of config.output) {
    if (output.type === 'file') {
      targets.push({
        target: 'pino/file',
        options: { destination: output.path, mkdir: true },
        level: config.level,
      });
    } else if (output.format === 'pretty') {
      targets.push({
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
        level: config.level,
      });
    }
  }

  if (targets.length === 0) return undefined;
  return targets.length === 1 ? targets[0] : { targets };
}

class SecureLoggerImpl implements SecureLogger {
  constructor(
    private readonly pino: PinoLogger,
    private readonly bound: LogContext = {}
  ) {}

  get level(): LogLevel {
    const current = this.pino.level;
    return isLogLevel(current) ? current : 'info';
  }

  private entry(context?: LogContext): object {
    const sanitized = sanitizeForLogging({ ...this.bound, ...context });
    return typeof sanitized === 'object' && sanitized !== null ? sanitized : {};
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(this.entry(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.entry(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.entry(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.entry(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.entry(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(this.entry(context), msg);
  }

  child(context: LogContext): SecureLogger {
    return new SecureLoggerImpl(this.pino, { ...this.bound, ...context });
  }
}

export function createLogger(config: LoggingConfig): SecureLogger {
  const transport = transportFor(config);
  const options = pinoOptions(config);
  return new SecureLoggerImpl(transport ? pino(options, pino.transport(transport)) : pino(options));
}

/** Adopt an existing pino instance, e.g. one writing to a memory stream. */
export function wrapPino(instance: PinoLogger, context: LogContext = {}): SecureLogger {
  return new SecureLoggerImpl(instance, context);
}

export function createNoopLogger(): SecureLogger {
  const noop: SecureLogger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
