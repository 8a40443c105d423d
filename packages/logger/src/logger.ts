/** Structured logger with optional batched delivery to a transport */

import { ulid } from 'ulid';
import type {
  ConsoleSink,
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogTransport,
} from './types.js';

/** Environment-specific configurations */
const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
    bufferSize: 1000,
  },
  development: {
    minLevel: 'info',
    includeStackTraces: true,
    bufferSize: 50,
  },
  production: {
    minLevel: 'warn',
    includeStackTraces: false,
    bufferSize: 50,
  },
};

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

export function isEnvironment(value: string): value is Environment {
  return Object.prototype.hasOwnProperty.call(ENVIRONMENT_CONFIGS, value);
}

const defaultSink: ConsoleSink = (level, line) => {
  if (level === 'error' || level === 'fatal') {
    console.error(line);
  } else {
    console.log(line);
  }
};

/**
 * Shared state between a logger and its children, so that a child's entries
 * land in the same buffer and the same flush drains them.
 */
interface LoggerCore {
  buffer: LogEntry[];
  transport?: LogTransport;
  sink: ConsoleSink;
  bufferSize: number;
  minLevel: LogLevel;
  consoleLevel: LogLevel;
  consoleOnly: boolean;
  silent: boolean;
  envConfig: EnvironmentConfig;
  /** Settles once every batch handed out so far has been delivered */
  delivery: Promise<void>;
}

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private core: LoggerCore;

  constructor(core: LoggerCore, parentMetadata: Record<string, unknown> = {}) {
    this.core = core;
    this.metadata = parentMetadata;
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(this.core, { ...this.metadata, ...metadata });
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
    // Fatal logs flush immediately (don't wait for batch)
    this.flush().catch((err) => {
      this.core.sink('error', `Failed to flush fatal log: ${String(err)}`);
    });
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    const priority = LOG_LEVEL_PRIORITY[level];
    const toConsole = !this.core.silent && priority >= LOG_LEVEL_PRIORITY[this.core.consoleLevel];
    // Debug entries never reach the transport
    const toTransport =
      !this.core.consoleOnly &&
      this.core.transport !== undefined &&
      level !== 'debug' &&
      priority >= LOG_LEVEL_PRIORITY[this.core.minLevel];

    if (!toConsole && !toTransport) {
      return;
    }

    const entry: LogEntry = {
      id: ulid(),
      level,
      event_type,
      metadata: this.serializeMetadata({ ...this.metadata, ...metadata }),
      timestamp: Date.now(),
    };

    if (toConsole) {
      this.logToConsole(entry);
    }

    if (toTransport) {
      this.core.buffer.push(entry);

      if (this.core.buffer.length >= this.core.bufferSize) {
        this.flush().catch((err) => {
          this.core.sink('error', `Failed to auto-flush logs: ${String(err)}`);
        });
      }
    }
  }

  /**
   * Batches are delivered one at a time, in the order they were drained, so
   * awaiting flush() also awaits every earlier auto-flush.
   */
  async flush(): Promise<void> {
    const { transport } = this.core;
    if (this.core.consoleOnly || !transport || this.core.buffer.length === 0) {
      return this.core.delivery;
    }

    const toFlush = this.core.buffer.splice(0, this.core.buffer.length);
    this.core.delivery = this.core.delivery.then(() => this.deliver(transport, toFlush));
    return this.core.delivery;
  }

  private async deliver(transport: LogTransport, entries: LogEntry[]): Promise<void> {
    try {
      await transport(entries);
    } catch (err) {
      // Delivery failures are reported but never thrown into the caller's code path
      this.core.sink(
        'error',
        `Failed to flush logs: ${err instanceof Error ? err.message : String(err)} (${entries.length} entries)`,
      );
    }
  }

  protected logToConsole(entry: LogEntry): void {
    const logData = {
      level: entry.level,
      event_type: entry.event_type,
      metadata: entry.metadata,
      timestamp: new Date(entry.timestamp).toISOString(),
    };
    this.core.sink(entry.level, JSON.stringify(logData));
  }

  /**
   * Errors do not survive JSON.stringify, so they are flattened here.
   */
  private serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      if (value instanceof Error) {
        result[key] = {
          name: value.name,
          message: value.message,
          ...(this.core.envConfig.includeStackTraces && value.stack ? { stack: value.stack } : {}),
        };
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const environment = config.environment ?? 'development';
  const envConfig = ENVIRONMENT_CONFIGS[environment];
  const minLevel = config.minLevel ?? envConfig.minLevel;

  return new LoggerImpl({
    buffer: [],
    transport: config.transport,
    sink: config.sink ?? defaultSink,
    bufferSize: config.bufferSize ?? envConfig.bufferSize,
    minLevel,
    consoleLevel: config.consoleLevel ?? minLevel,
    consoleOnly: config.consoleOnly ?? false,
    silent: config.silent ?? false,
    envConfig,
    delivery: Promise.resolve(),
  });
}
