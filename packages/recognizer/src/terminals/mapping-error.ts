import { RecognizerError } from '../errors.js';
import type { SymbolKind } from '../lexer/symbol-kind.js';

/**
 * Error thrown while projecting symbols onto the parser's terminals
 */
export abstract class MappingError extends RecognizerError {
  /** The lexeme that could not be mapped */
  readonly text: string;
  declare readonly offset: number;

  constructor(message: string, text: string, offset: number) {
    super(message, offset);
    this.text = text;
  }
}

/**
 * A keyword was recognized but the grammar has no terminal for its exact text
 */
export class UnmappedKeywordError extends MappingError {
  readonly code = 'UNMAPPED_KEYWORD' as const;

  constructor(text: string, offset: number) {
    super(`Keyword ${JSON.stringify(text)} has no terminal`, text, offset);
  }
}

/**
 * The grammar does not use symbols of this kind
 */
export class UnsupportedSymbolKindError extends MappingError {
  readonly code = 'UNSUPPORTED_SYMBOL_KIND' as const;
  readonly kind: SymbolKind;

  constructor(kind: SymbolKind, text: string, offset: number) {
    super(`${kind} ${JSON.stringify(text)} is not allowed here`, text, offset);
    this.kind = kind;
  }
}
