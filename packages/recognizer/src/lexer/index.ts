export { formatSymbolTable } from './format.js';
export {
  EmptyLexicalMatchError,
  LexerError,
  NoLexicalMatchError,
  PatternTableConfigError,
} from './lexer-error.js';
export {
  DEFAULT_PATTERN_TABLE,
  DEFAULT_PATTERNS,
  PatternTable,
  type PatternDefinition,
  type PatternMatch,
  type PatternTableOptions,
} from './pattern-table.js';
export { createSymbol, type LexicalSymbol, type ScannedSymbol } from './symbol.js';
export { isSymbolKind, SymbolKind } from './symbol-kind.js';
export { Tokenizer, type TokenizerOptions } from './tokenizer.js';
