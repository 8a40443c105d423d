/**
 * Check result reporter
 */

import {
  describeDdlSymbol,
  formatTerminalWord,
  formatTrace,
  ParseError,
  type TraceRecord,
  type Validation,
} from '@ddl-pda/recognizer';
import chalk from 'chalk';

export type ReportFormat = 'pretty' | 'json';

export const REPORT_FORMATS: readonly ReportFormat[] = ['pretty', 'json'];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export interface ReporterOptions {
  format: ReportFormat;
  /** Leave accepted statements out of the pretty listing */
  quiet?: boolean;
  noColor?: boolean;
  /** Include the automaton trace of each statement */
  trace?: boolean;
}

export interface CheckedStatement {
  source: string;
  validation: Validation;
}

type Colorize = (s: string) => string;

interface Palette {
  green: Colorize;
  red: Colorize;
  gray: Colorize;
}

const plain: Palette = {
  green: (s) => s,
  red: (s) => s,
  gray: (s) => s,
};

const TRACE_INDENT = '      ';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

/**
 * One space per code point before `offset`, keeping tabs so the caret lines
 * up under a tab-indented source. Characters drawn two columns wide still
 * shift it.
 */
function caretPadding(source: string, offset: number): string {
  return Array.from(source.slice(0, offset), (char) => (char === '\t' ? '\t' : ' ')).join('');
}

/**
 * Trace of an accepted statement, or of a rejected one up to the failing step
 */
function traceOf(validation: Validation): readonly TraceRecord<string, string>[] {
  if (validation.valid) {
    return validation.recognition.trace;
  }
  return validation.error instanceof ParseError ? validation.error.trace : [];
}

function formatPretty(results: readonly CheckedStatement[], options: ReporterOptions): string {
  const c: Palette = options.noColor ? plain : chalk;
  const lines: string[] = [];

  for (const { source, validation } of results) {
    if (options.quiet && validation.valid) continue;

    lines.push('', `  ${source}`);

    if (validation.valid) {
      lines.push(`    ${c.green('✓')} accepted  ${formatTerminalWord(validation.recognition.terminals)}`);
    } else {
      lines.push(`    ${c.red('✗')} ${validation.phase} error  ${validation.error.message}`);
      if (validation.phase !== 'input') {
        lines.push(`      ${source}`, `      ${caretPadding(source, validation.offset)}${c.red('^')}`);
      }
    }

    const trace = traceOf(validation);
    if (options.trace && trace.length > 0) {
      lines.push('');
      for (const line of formatTrace(trace, describeDdlSymbol).split('\n')) {
        lines.push(c.gray(`${TRACE_INDENT}${line}`.trimEnd()));
      }
    }
  }

  const rejected = results.filter((r) => !r.validation.valid).length;

  lines.push('');
  if (rejected === 0) {
    lines.push(c.green(`  ✓ All ${plural(results.length, 'statement')} accepted`));
  } else {
    lines.push(c.gray(`  ${rejected} of ${plural(results.length, 'statement')} rejected`));
  }
  lines.push('');

  return lines.join('\n');
}

function formatJson(results: readonly CheckedStatement[], options: ReporterOptions): string {
  const output = {
    statements: results.map(({ source, validation }) => {
      const trace = options.trace
        ? {
            trace: traceOf(validation).map((record) => ({
              step: record.step,
              action: record.action,
              stack: record.stack.map(describeDdlSymbol),
              remaining: record.remaining,
            })),
          }
        : {};

      if (validation.valid) {
        return { source, valid: true, terminals: validation.recognition.terminals, ...trace };
      }
      return {
        source,
        valid: false,
        phase: validation.phase,
        code: validation.error.code,
        message: validation.error.message,
        offset: validation.offset,
        ...trace,
      };
    }),
    summary: {
      statements: results.length,
      accepted: results.filter((r) => r.validation.valid).length,
      rejected: results.filter((r) => !r.validation.valid).length,
    },
  };

  return JSON.stringify(output, null, 2);
}

/**
 * Render check results in the requested format
 */
export function formatReport(results: readonly CheckedStatement[], options: ReporterOptions): string {
  return options.format === 'json' ? formatJson(results, options) : formatPretty(results, options);
}
