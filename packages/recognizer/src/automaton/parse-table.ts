import type { StackSymbol } from './stack-symbol.js';

/**
 * One table cell: in `state` with `lookahead` in front, replace the state
 * with `production` (first symbol is matched first)
 */
export interface ParseTableEntry<S extends string, T extends string> {
  state: S;
  lookahead: T;
  production: readonly StackSymbol<S, T>[];
}

/**
 * Thrown when a parse table is built from conflicting entries
 */
export class ParseTableConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseTableConfigError';
  }
}

/**
 * Immutable LL(1) table mapping (state, lookahead) to a production
 */
export class ParseTable<S extends string, T extends string> {
  private readonly rows = new Map<S, Map<T, readonly StackSymbol<S, T>[]>>();
  private entryCount = 0;

  constructor(entries: Iterable<ParseTableEntry<S, T>>) {
    for (const { state, lookahead, production } of entries) {
      let row = this.rows.get(state);
      if (!row) {
        row = new Map();
        this.rows.set(state, row);
      }
      if (row.has(lookahead)) {
        throw new ParseTableConfigError(`Duplicate table entry for state ${state} on lookahead ${lookahead}`);
      }
      row.set(lookahead, Object.freeze([...production]));
      this.entryCount++;
    }
  }

  get size(): number {
    return this.entryCount;
  }

  lookup(state: S, lookahead: T): readonly StackSymbol<S, T>[] | undefined {
    return this.rows.get(state)?.get(lookahead);
  }

  /**
   * The production of a state that has exactly one, otherwise undefined
   */
  soleProduction(state: S): readonly StackSymbol<S, T>[] | undefined {
    const row = this.rows.get(state);
    if (!row || row.size !== 1) {
      return undefined;
    }
    const [production] = row.values();
    return production;
  }

  /** Lookaheads with an entry for `state`, in insertion order */
  lookaheads(state: S): T[] {
    return [...(this.rows.get(state)?.keys() ?? [])];
  }

  *entries(): IterableIterator<ParseTableEntry<S, T>> {
    for (const [state, row] of this.rows) {
      for (const [lookahead, production] of row) {
        yield { state, lookahead, production };
      }
    }
  }
}
