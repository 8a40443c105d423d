import { createLogger, type LogEntry, type Logger, type LogTransport } from '@ddl-pda/logger';
import { appendFile } from 'node:fs/promises';
import type { CliConfig } from './config.js';

/**
 * Append each batch of entries to a JSON lines file
 */
export function createFileTransport(filePath: string): LogTransport {
  return async (entries: LogEntry[]) => {
    await appendFile(filePath, entries.map((entry) => `${JSON.stringify(entry)}\n`).join(''), 'utf-8');
  };
}

/**
 * Logger for a CLI run. The log file keeps the environment's minimum level;
 * console lines go to stderr at the configured log level, and not at all
 * without one.
 */
export function createCliLogger(config: CliConfig, logFile: string | undefined = config.logFile): Logger {
  return createLogger({
    environment: config.environment,
    consoleLevel: config.logLevel,
    silent: config.logLevel === undefined,
    transport: logFile ? createFileTransport(logFile) : undefined,
    consoleOnly: !logFile,
    sink: (_level, line) => {
      process.stderr.write(`${line}\n`);
    },
  });
}
