import { describeSymbol, terminal, type StackSymbol, type SymbolDescriber } from './stack-symbol.js';

export type TraceAction = 'start' | 'expand' | 'match' | 'skip-empty' | 'accept';

/**
 * Snapshot of the automaton after one stack mutation
 */
export interface TraceRecord<S extends string, T extends string> {
  step: number;
  action: TraceAction;
  /** Stack contents, bottom first */
  stack: readonly StackSymbol<S, T>[];
  /** Terminals not yet consumed */
  remaining: readonly T[];
}

const STACK_COLUMN_WIDTH = 48;

/**
 * Render a trace as two columns: the stack (bottom to top) and the remaining input
 */
export function formatTrace<S extends string, T extends string>(
  trace: readonly TraceRecord<S, T>[],
  describe: SymbolDescriber<S, T> = describeSymbol,
): string {
  return trace
    .map((record) => {
      const stack = record.stack.map(describe).join(' ');
      const remaining = record.remaining.map((t) => describe(terminal(t))).join(' ');
      return `${stack.padEnd(STACK_COLUMN_WIDTH)} ${remaining}`.trimEnd();
    })
    .join('\n');
}
