/**
 * ddl-pda check command
 *
 * Checks each statement against the ALTER TABLE ... DROP COLUMN grammar.
 * Exit code 0 when every statement is accepted, 1 when any is rejected and
 * 2 on usage, configuration or IO errors.
 */

import type { Logger } from '@ddl-pda/logger';
import { PatternTable, validate } from '@ddl-pda/recognizer';
import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import { loadConfig } from '../config.js';
import { createCliLogger } from '../logging.js';
import { formatReport, isReportFormat, REPORT_FORMATS, type CheckedStatement } from '../report/reporter.js';

export const SAMPLE_STATEMENT = 'ALTER TABLE Table1 DROP COLUMN Email';

const CASE_SENSITIVE_PATTERNS = new PatternTable(undefined, { caseInsensitive: false });

interface CheckOptions {
  file?: string;
  format: string;
  trace?: boolean;
  quiet?: boolean;
  color: boolean;
  strictCase?: boolean;
  logFile?: string;
}

/**
 * Statements from the arguments followed by the non-empty lines of the file;
 * the sample statement when neither gives any
 */
export async function collectStatements(args: readonly string[], file?: string): Promise<string[]> {
  const statements = [...args];

  if (file !== undefined) {
    const content = await fs.readFile(file, 'utf-8');
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (trimmed) {
        statements.push(trimmed);
      }
    }
  }

  return statements.length > 0 ? statements : [SAMPLE_STATEMENT];
}

export function checkStatements(
  statements: readonly string[],
  options: { strictCase?: boolean; logger?: Logger } = {},
): CheckedStatement[] {
  const patterns = options.strictCase ? CASE_SENSITIVE_PATTERNS : undefined;

  return statements.map((source, index) => ({
    source,
    validation: validate(source, { patterns, logger: options.logger?.child({ statement: index }) }),
  }));
}

export const checkCommand = new Command('check')
  .description('Check DDL statements against the ALTER TABLE ... DROP COLUMN grammar')
  .argument('[statements...]', 'Statements to check')
  .option('-f, --file <path>', 'Read statements from a file, one per non-empty line')
  .option('--format <type>', `Output format: ${REPORT_FORMATS.join(', ')}`, 'pretty')
  .option('--trace', 'Print the automaton trace of each statement')
  .option('--strict-case', 'Match keywords case-sensitively')
  .option('--quiet', 'Only list rejected statements')
  .option('--no-color', 'Disable colored output')
  .option('--log-file <path>', 'Append log entries to a JSON lines file')
  .action(async (args: string[], options: CheckOptions) => {
    try {
      const { format } = options;
      if (!isReportFormat(format)) {
        throw new Error(`Unknown format "${format}"; expected ${REPORT_FORMATS.join(' or ')}`);
      }

      const config = loadConfig();
      const logger = createCliLogger(config, options.logFile ?? config.logFile);
      const statements = await collectStatements(args, options.file);

      const results = checkStatements(statements, { strictCase: options.strictCase, logger });
      await logger.flush();

      console.log(
        formatReport(results, { format, quiet: options.quiet, noColor: !options.color, trace: options.trace }),
      );

      process.exit(results.every((r) => r.validation.valid) ? 0 : 1);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });
