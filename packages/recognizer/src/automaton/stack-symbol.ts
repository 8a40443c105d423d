/**
 * Symbols held on the automaton's stack
 */

export interface TerminalSymbol<T extends string> {
  readonly kind: 'terminal';
  readonly terminal: T;
}

export interface StateSymbol<S extends string> {
  readonly kind: 'state';
  readonly state: S;
}

/** Right-hand side of an epsilon production */
export interface EmptySymbol {
  readonly kind: 'empty';
}

export type StackSymbol<S extends string, T extends string> = TerminalSymbol<T> | StateSymbol<S> | EmptySymbol;

export const EMPTY: EmptySymbol = Object.freeze<EmptySymbol>({ kind: 'empty' });

export function terminal<T extends string>(value: T): TerminalSymbol<T> {
  return { kind: 'terminal', terminal: value };
}

export function state<S extends string>(value: S): StateSymbol<S> {
  return { kind: 'state', state: value };
}

/** Renders one symbol for traces and error messages */
export type SymbolDescriber<S extends string, T extends string> = (symbol: StackSymbol<S, T>) => string;

export function describeSymbol<S extends string, T extends string>(symbol: StackSymbol<S, T>): string {
  switch (symbol.kind) {
    case 'terminal':
      return symbol.terminal;
    case 'state':
      return `<${symbol.state}>`;
    case 'empty':
      return 'ε';
  }
}
