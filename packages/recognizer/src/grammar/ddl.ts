/**
 * Grammar for `ALTER TABLE <identifier> DROP COLUMN <identifier>`
 *
 * Only configuration lives here; the tokenizer, mapper and automaton are
 * generic over it.
 */

import { describeSymbol, EMPTY, ParseTable, terminal, type StackSymbol } from '../automaton/index.js';

export const Terminal = {
  ALTER_TABLE: 'AlterTableKeyword',
  DROP_COLUMN: 'DropColumnKeyword',
  IDENTIFIER: 'Identifier',
  END: 'EndMarker',
} as const;

export type Terminal = (typeof Terminal)[keyof typeof Terminal];

export const ParserState = {
  START: 'Start',
  ALTER: 'Alter',
  EPSILON: 'Epsilon',
} as const;

export type ParserState = (typeof ParserState)[keyof typeof ParserState];

export type DdlStackSymbol = StackSymbol<ParserState, Terminal>;

/** Exact keyword text to terminal */
export const DDL_KEYWORDS: Readonly<Record<string, Terminal>> = Object.freeze({
  'ALTER TABLE': Terminal.ALTER_TABLE,
  'DROP COLUMN': Terminal.DROP_COLUMN,
});

/**
 * Start expands to the whole statement. The Alter and Epsilon rows are
 * nullable and unreachable from Start; they are kept as table data.
 */
export const DDL_PARSE_TABLE = new ParseTable<ParserState, Terminal>([
  {
    state: ParserState.START,
    lookahead: Terminal.ALTER_TABLE,
    production: [
      terminal(Terminal.ALTER_TABLE),
      terminal(Terminal.IDENTIFIER),
      terminal(Terminal.DROP_COLUMN),
      terminal(Terminal.IDENTIFIER),
    ],
  },
  { state: ParserState.ALTER, lookahead: Terminal.END, production: [EMPTY] },
  { state: ParserState.EPSILON, lookahead: Terminal.IDENTIFIER, production: [EMPTY] },
]);

const TERMINAL_LABELS: Readonly<Record<string, string>> = {
  AlterTableKeyword: '<ALTER TABLE>',
  DropColumnKeyword: '<DROP COLUMN>',
  Identifier: '<id>',
  EndMarker: '$',
} satisfies Record<Terminal, string>;

const STATE_LABELS: Readonly<Record<string, string>> = {
  Start: '<S>',
  Alter: '<ALT>',
  Epsilon: '<EMP>',
} satisfies Record<ParserState, string>;

/**
 * Trace labels for the DDL grammar. Names it does not know are rendered by describeSymbol.
 */
export function describeDdlSymbol(symbol: StackSymbol<string, string>): string {
  if (symbol.kind === 'terminal' && Object.hasOwn(TERMINAL_LABELS, symbol.terminal)) {
    return TERMINAL_LABELS[symbol.terminal];
  }
  if (symbol.kind === 'state' && Object.hasOwn(STATE_LABELS, symbol.state)) {
    return STATE_LABELS[symbol.state];
  }
  return describeSymbol(symbol);
}

/**
 * Render a terminal word in bracketed form, e.g. `<ALTER TABLE><id>`.
 * Display only; nothing parses this string.
 */
export function formatTerminalWord(terminals: readonly Terminal[]): string {
  return terminals.map((t) => TERMINAL_LABELS[t]).join('');
}
