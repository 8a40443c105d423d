/**
 * Symbol kinds recognized by the tokenizer
 *
 * Each kind owns exactly one pattern in a pattern table.
 */

export const SymbolKind = {
  KEYWORD: 'Keyword', // ALTER TABLE, DROP COLUMN
  IDENTIFIER: 'Identifier', // Table1, dbo.Users
  NUMBER: 'Number', // 42
  OPERATOR: 'Operator', // = ( ) * ,
  STRING_LITERAL: 'StringLiteral', // 'text'
  WHITESPACE: 'Whitespace',
} as const;

export type SymbolKind = (typeof SymbolKind)[keyof typeof SymbolKind];

const SYMBOL_KINDS: ReadonlySet<string> = new Set(Object.values(SymbolKind));

export function isSymbolKind(value: string): value is SymbolKind {
  return SYMBOL_KINDS.has(value);
}
