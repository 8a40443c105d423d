export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
  bufferSize: number;
}

export interface LogEntry {
  id: string;
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

/**
 * Receives batches of buffered entries on flush.
 */
export type LogTransport = (entries: LogEntry[]) => Promise<void>;

/**
 * Writes one formatted console line. Defaults to console.log / console.error.
 */
export type ConsoleSink = (level: LogLevel, line: string) => void;

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata.
   */
  child(metadata: Record<string, unknown>): Logger;

  /**
   * Log at debug level (console only, never handed to the transport)
   */
  debug(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at info level
   */
  info(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at warn level
   */
  warn(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at error level
   */
  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level (flushes immediately)
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Hand buffered log entries to the transport
   */
  flush(): Promise<void>;
}

export interface LoggerConfig {
  transport?: LogTransport;
  sink?: ConsoleSink;
  bufferSize?: number;
  /** Lowest level kept; defaults to the environment preset */
  minLevel?: LogLevel;
  /** Lowest level written to the console; defaults to minLevel */
  consoleLevel?: LogLevel;
  consoleOnly?: boolean;
  silent?: boolean;
  environment?: Environment;
}
