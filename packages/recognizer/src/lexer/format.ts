import type { LexicalSymbol } from './symbol.js';

const COLUMN_WIDTHS = [14, 20, 8] as const;

function row(kind: string, lexeme: string, start: string, length: string): string {
  return [
    kind.padEnd(COLUMN_WIDTHS[0]),
    lexeme.padEnd(COLUMN_WIDTHS[1]),
    start.padEnd(COLUMN_WIDTHS[2]),
    length,
  ]
    .join(' ')
    .trimEnd();
}

/**
 * Render symbols as a fixed-width table: kind, lexeme, start, length
 */
export function formatSymbolTable(symbols: readonly LexicalSymbol[]): string {
  const lines = [row('Kind', 'Lexeme', 'Start', 'Length')];
  for (const symbol of symbols) {
    lines.push(row(symbol.kind, symbol.text, String(symbol.startOffset), String(symbol.length)));
  }
  return lines.join('\n');
}
