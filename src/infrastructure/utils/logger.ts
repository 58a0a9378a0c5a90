import pino from 'pino';
import type { DestinationStream, Level, Logger as PinoInstance, LoggerOptions, StreamEntry } from 'pino';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { LOG_FILE, LOG_LEVEL, SERVICE_NAME, SERVICE_VERSION } from '../config.js';

export interface LogContext {
  operation?: string;
  provider?: string;
  model?: string;
  phase?: string;
  duration?: number;
  module?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, meta?: LogContext): void;
  error(message: string, error?: unknown, meta?: LogContext): void;
  warn(message: string, meta?: LogContext): void;
  debug(message: string, meta?: LogContext): void;
  timer(operation: string): () => void;
  child(bindings: LogContext): Logger;
}

function buildStreams(level: string): StreamEntry[] {
  const streams: StreamEntry[] = [{ stream: process.stdout, level: toStreamLevel(level) }];

  if (LOG_FILE) {
    const logFile = resolve(process.cwd(), LOG_FILE);
    const logsDir = dirname(logFile);
    if (!existsSync(logsDir)) mkdirSync(logsDir, { recursive: true });
    streams.push({ stream: pino.destination(logFile), level: toStreamLevel(level) });
  }

  return streams;
}

// multistream entries cannot be 'silent'; the logger level already filters everything out
function toStreamLevel(level: string): Level {
  switch (level) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
      return level;
    default:
      return 'fatal';
  }
}

const baseOpts: LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: { level: (label) => ({ level: label }) },
  redact: ['apiKey', 'api_key', 'token', 'secret', 'authorization', 'headers.authorization', 'headers["x-api-key"]', 'credentials'],
  serializers: { err: pino.stdSerializers.err },
  base: { service: SERVICE_NAME, version: SERVICE_VERSION },
};

class PinoLogger implements Logger {
  constructor(private readonly p: PinoInstance) {}

  info(message: string, meta?: LogContext): void {
    this.p.info(meta || {}, message);
  }
  error(message: string, error?: unknown, meta?: LogContext): void {
    const logData = { ...(meta || {}), ...(error !== undefined && { err: error }) };
    this.p.error(logData, message);
  }
  warn(message: string, meta?: LogContext): void {
    this.p.warn(meta || {}, message);
  }
  debug(message: string, meta?: LogContext): void {
    this.p.debug(meta || {}, message);
  }
  timer(operation: string): () => void {
    const start = Date.now();
    return () => this.debug('Operation completed', { operation, duration: Date.now() - start });
  }
  child(bindings: LogContext): Logger {
    return new PinoLogger(this.p.child(bindings));
  }
}

/**
 * Create a logger writing to the given destination.
 * Used by tests to capture output; the process-wide `logger` writes to stdout (and LOG_FILE if set).
 */
export function createLogger(destination?: DestinationStream, level: string = LOG_LEVEL): Logger {
  const opts = { ...baseOpts, level };
  const instance = destination
    ? pino(opts, destination)
    : pino(opts, pino.multistream(buildStreams(level)));
  return new PinoLogger(instance);
}

// Singleton
export const logger: Logger = createLogger();
