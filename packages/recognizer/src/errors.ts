/**
 * Error types shared by every recognizer phase
 *
 * Each phase throws its own subclasses (see lexer/lexer-error.ts,
 * terminals/mapping-error.ts and automaton/parse-error.ts); all of them carry
 * a machine-readable code and, where one is known, a source offset.
 */

export type RecognizerErrorCode =
  | 'SOURCE_TOO_LONG'
  | 'NO_LEXICAL_MATCH'
  | 'EMPTY_LEXICAL_MATCH'
  | 'UNMAPPED_KEYWORD'
  | 'UNSUPPORTED_SYMBOL_KIND'
  | 'UNEXPECTED_TERMINAL'
  | 'NO_TABLE_ENTRY'
  | 'UNCONSUMED_OBLIGATIONS'
  | 'UNCONSUMED_INPUT'
  | 'STEP_LIMIT_EXCEEDED';

/**
 * Base class for recognizer errors
 */
export abstract class RecognizerError extends Error {
  abstract readonly code: RecognizerErrorCode;
  /** 0-based offset into the source text (if available) */
  readonly offset: number | null;

  constructor(message: string, offset: number | null = null) {
    const fullMessage = offset !== null ? `${message} at offset ${offset}` : message;
    super(fullMessage);
    this.name = this.constructor.name;
    this.offset = offset;
  }
}

/**
 * Thrown before tokenizing when the source exceeds the configured length limit
 */
export class SourceLengthError extends RecognizerError {
  readonly code = 'SOURCE_TOO_LONG' as const;
  readonly limit: number;

  constructor(limit: number) {
    super(`Statement exceeds maximum length of ${limit} characters`);
    this.limit = limit;
  }
}
