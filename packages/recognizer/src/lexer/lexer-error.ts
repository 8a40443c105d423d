import { RecognizerError } from '../errors.js';
import type { SymbolKind } from './symbol-kind.js';

/**
 * Error thrown during lexical analysis
 */
export abstract class LexerError extends RecognizerError {
  /** The statement that failed to tokenize */
  readonly source: string;
  declare readonly offset: number;

  constructor(message: string, source: string, offset: number) {
    super(message, offset);
    this.source = source;
  }
}

/**
 * No pattern matches the text remaining at `offset`
 */
export class NoLexicalMatchError extends LexerError {
  readonly code = 'NO_LEXICAL_MATCH' as const;

  /** The unmatched character, a whole code point */
  readonly character: string;

  constructor(source: string, offset: number) {
    const codePoint = source.codePointAt(offset);
    const character = codePoint === undefined ? '' : String.fromCodePoint(codePoint);
    super(`No pattern matches ${JSON.stringify(character)}`, source, offset);
    this.character = character;
  }
}

/**
 * A pattern matched zero characters; the scan could never advance past it
 */
export class EmptyLexicalMatchError extends LexerError {
  readonly code = 'EMPTY_LEXICAL_MATCH' as const;
  readonly kind: SymbolKind;

  constructor(source: string, offset: number, kind: SymbolKind) {
    super(`Pattern for ${kind} matched an empty string`, source, offset);
    this.kind = kind;
  }
}

/**
 * Thrown when a pattern table is built from invalid definitions
 */
export class PatternTableConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PatternTableConfigError';
  }
}
