import type { Logger } from '@ddl-pda/logger';
import {
  NoTableEntryError,
  StepLimitExceededError,
  UnconsumedInputError,
  UnconsumedObligationsError,
  UnexpectedTerminalError,
} from './parse-error.js';
import type { ParseTable } from './parse-table.js';
import {
  describeSymbol,
  state,
  terminal,
  type StackSymbol,
  type SymbolDescriber,
  type TerminalSymbol,
} from './stack-symbol.js';
import { SymbolStack } from './symbol-stack.js';
import type { TraceAction, TraceRecord } from './trace.js';

export const DEFAULT_MAX_STEPS = 10_000;

export interface StackAutomatonConfig<S extends string, T extends string> {
  table: ParseTable<S, T>;
  /** State the stack starts with */
  start: S;
  /** Terminal that stands for end of input; the bottom of every stack */
  endMarker: T;
  /**
   * When a state has no entry for the lookahead but exactly one production,
   * expand that production anyway and let its first terminal report the
   * mismatch (default: true)
   */
  expandSoleProduction?: boolean;
  /** Upper bound on popped symbols per analysis (default: 10 000) */
  maxSteps?: number;
  /** Receives one debug entry per trace record */
  logger?: Logger;
  /** Renders symbols in log entries */
  describe?: SymbolDescriber<S, T>;
}

export interface AnalysisResult<S extends string, T extends string> {
  accepted: true;
  /** Symbols popped from the stack */
  steps: number;
  trace: TraceRecord<S, T>[];
}

/**
 * Table-driven pushdown automaton (predictive LL parser)
 *
 * The automaton knows nothing about any particular grammar: the parse table
 * is its program. One analyze() call owns its own stack and cursor.
 */
export class StackAutomaton<S extends string, T extends string> {
  readonly table: ParseTable<S, T>;
  readonly start: S;
  readonly endMarker: T;
  private readonly expandSoleProduction: boolean;
  private readonly maxSteps: number;
  private readonly logger?: Logger;
  private readonly describe: SymbolDescriber<S, T>;

  constructor(config: StackAutomatonConfig<S, T>) {
    this.table = config.table;
    this.start = config.start;
    this.endMarker = config.endMarker;
    this.expandSoleProduction = config.expandSoleProduction ?? true;
    this.maxSteps = config.maxSteps ?? DEFAULT_MAX_STEPS;
    this.logger = config.logger;
    this.describe = config.describe ?? describeSymbol;
  }

  /**
   * Run the automaton over a terminal word
   *
   * @returns The accepted analysis with its trace
   * @throws {ParseError} On the first mismatch; the error carries the trace so far
   */
  analyze(terminals: readonly T[]): AnalysisResult<S, T> {
    const input = [...terminals];
    const stack = new SymbolStack<S, T>();
    const trace: TraceRecord<S, T>[] = [];
    let cursor = 0;
    let steps = 0;

    const isExhausted = () => cursor >= input.length;
    const lookahead = () => (isExhausted() ? this.endMarker : input[cursor]);

    const record = (action: TraceAction) => {
      const entry: TraceRecord<S, T> = {
        step: trace.length,
        action,
        stack: stack.snapshot(),
        remaining: input.slice(cursor),
      };
      trace.push(entry);
      this.logger?.debug('automaton_step', {
        step: entry.step,
        action,
        stack: entry.stack.map(this.describe).join(' '),
        remaining: entry.remaining.join(' '),
      });
    };

    const pendingWith = (popped: StackSymbol<S, T>) =>
      [popped, ...stack.topDown()].filter((symbol) => !this.isEndMarker(symbol) && symbol.kind !== 'empty');

    stack.push(terminal(this.endMarker));
    stack.push(state(this.start));
    record('start');

    let top: StackSymbol<S, T> | undefined;
    while ((top = stack.pop()) !== undefined) {
      if (++steps > this.maxSteps) {
        throw new StepLimitExceededError(this.maxSteps, cursor, trace);
      }

      switch (top.kind) {
        case 'empty':
          record('skip-empty');
          break;

        case 'terminal':
          if (top.terminal === this.endMarker) {
            // The end marker sits at the bottom, so the stack is now empty
            if (!isExhausted()) {
              throw new UnconsumedInputError(input.slice(cursor), cursor, trace);
            }
            record('match');
            break;
          }
          if (isExhausted()) {
            throw new UnconsumedObligationsError(pendingWith(top), cursor, trace);
          }
          if (top.terminal !== lookahead()) {
            throw new UnexpectedTerminalError(top.terminal, lookahead(), cursor, trace);
          }
          cursor++;
          record('match');
          break;

        case 'state': {
          const production = this.productionFor(top.state, lookahead());
          if (!production) {
            if (isExhausted()) {
              throw new UnconsumedObligationsError(pendingWith(top), cursor, trace);
            }
            throw new NoTableEntryError(top.state, lookahead(), cursor, trace);
          }
          stack.pushProduction(production);
          record('expand');
          break;
        }
      }
    }

    record('accept');
    return { accepted: true, steps, trace };
  }

  private productionFor(current: S, lookahead: T): readonly StackSymbol<S, T>[] | undefined {
    const production = this.table.lookup(current, lookahead);
    if (production || !this.expandSoleProduction) {
      return production;
    }
    return this.table.soleProduction(current);
  }

  private isEndMarker(symbol: StackSymbol<S, T>): symbol is TerminalSymbol<T> {
    return symbol.kind === 'terminal' && symbol.terminal === this.endMarker;
  }
}
