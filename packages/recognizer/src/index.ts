/**
 * @ddl-pda/recognizer
 *
 * Recognizes `ALTER TABLE <identifier> DROP COLUMN <identifier>` with a
 * pattern-table tokenizer and a table-driven pushdown automaton. The engine
 * pieces are exported for use with other grammars.
 */

import type { Logger } from '@ddl-pda/logger';
import { StackAutomaton, type AnalysisResult, ParseError, type ParseTable, type TraceRecord } from './automaton/index.js';
import { RecognizerError, SourceLengthError } from './errors.js';
import {
  DDL_KEYWORDS,
  DDL_PARSE_TABLE,
  describeDdlSymbol,
  ParserState,
  Terminal,
} from './grammar/ddl.js';
import { DEFAULT_PATTERN_TABLE, LexerError, type LexicalSymbol, type PatternTable, Tokenizer } from './lexer/index.js';
import { MappingError, TerminalMapper } from './terminals/index.js';

export * from './automaton/index.js';
export * from './lexer/index.js';
export * from './terminals/index.js';
export {
  DDL_KEYWORDS,
  DDL_PARSE_TABLE,
  describeDdlSymbol,
  formatTerminalWord,
  ParserState,
  Terminal,
  type DdlStackSymbol,
} from './grammar/ddl.js';
export { RecognizerError, SourceLengthError, type RecognizerErrorCode } from './errors.js';

/**
 * Default limits for recognition
 */
export const DEFAULT_LIMITS = {
  /** Maximum statement length in characters */
  maxSourceLength: 10_000,
} as const;

/**
 * Options for recognition; each one replaces part of the bundled DDL configuration
 */
export interface RecognizeOptions {
  patterns?: PatternTable;
  keywords?: Readonly<Record<string, Terminal>>;
  table?: ParseTable<ParserState, Terminal>;
  expandSoleProduction?: boolean;
  maxSteps?: number;
  logger?: Logger;
  /** Override default limits (set to Infinity to disable) */
  limits?: Partial<Record<keyof typeof DEFAULT_LIMITS, number>>;
}

/**
 * Everything produced while accepting a statement
 */
export interface Recognition {
  source: string;
  symbols: LexicalSymbol[];
  terminals: Terminal[];
  trace: TraceRecord<ParserState, Terminal>[];
}

export type RecognitionPhase = 'input' | 'lexical' | 'mapping' | 'syntax';

export type Validation =
  | { valid: true; recognition: Recognition }
  | {
      valid: false;
      phase: RecognitionPhase;
      error: RecognizerError;
      /** Source offset the failure points at */
      offset: number;
      /** Symbols and terminals produced before the failing phase */
      symbols: LexicalSymbol[];
      terminals: Terminal[];
    };

const defaultTokenizer = new Tokenizer(DEFAULT_PATTERN_TABLE);
const defaultMapper = new TerminalMapper<Terminal>({ keywords: DDL_KEYWORDS, identifier: Terminal.IDENTIFIER });

interface Pipeline {
  tokenizer: Tokenizer;
  mapper: TerminalMapper<Terminal>;
  automaton: StackAutomaton<ParserState, Terminal>;
  maxSourceLength: number;
  logger?: Logger;
}

function createPipeline(options: RecognizeOptions): Pipeline {
  const limits = { ...DEFAULT_LIMITS, ...options.limits };

  return {
    tokenizer: options.patterns ? new Tokenizer(options.patterns) : defaultTokenizer,
    mapper: options.keywords
      ? new TerminalMapper<Terminal>({ keywords: options.keywords, identifier: Terminal.IDENTIFIER })
      : defaultMapper,
    automaton: createAutomaton(options.table ?? DDL_PARSE_TABLE, options),
    maxSourceLength: limits.maxSourceLength,
    logger: options.logger,
  };
}

function createAutomaton(
  table: ParseTable<ParserState, Terminal>,
  options: Pick<RecognizeOptions, 'expandSoleProduction' | 'maxSteps' | 'logger'>,
): StackAutomaton<ParserState, Terminal> {
  return new StackAutomaton({
    table,
    start: ParserState.START,
    endMarker: Terminal.END,
    expandSoleProduction: options.expandSoleProduction,
    maxSteps: options.maxSteps,
    logger: options.logger,
    describe: describeDdlSymbol,
  });
}

/**
 * Tokenize a statement with the bundled pattern table
 *
 * @throws {LexerError} If no pattern matches at some offset
 */
export function tokenize(source: string): LexicalSymbol[] {
  return defaultTokenizer.tokenize(source);
}

/**
 * Map symbols onto the DDL terminals
 *
 * @throws {MappingError} On a keyword without a terminal or a symbol kind the grammar does not use
 */
export function mapTerminals(symbols: readonly LexicalSymbol[]): Terminal[] {
  return defaultMapper.map(symbols);
}

/**
 * Run the DDL automaton over a terminal word
 *
 * @throws {ParseError} If the word is rejected
 */
export function analyze(
  terminals: readonly Terminal[],
  table: ParseTable<ParserState, Terminal> = DDL_PARSE_TABLE,
  options: Pick<RecognizeOptions, 'expandSoleProduction' | 'maxSteps' | 'logger'> = {},
): AnalysisResult<ParserState, Terminal> {
  return createAutomaton(table, options).analyze(terminals);
}

/**
 * Tokenize, map and analyze a statement
 *
 * @param source - The statement text
 * @param options - Optional configuration overrides
 * @returns The symbols, terminals and automaton trace of the accepted statement
 * @throws {SourceLengthError} If the statement exceeds limits
 * @throws {LexerError} If the statement cannot be tokenized
 * @throws {MappingError} If a symbol has no terminal
 * @throws {ParseError} If the automaton rejects the terminals
 *
 * @example
 * ```ts
 * recognize('ALTER TABLE Table1 DROP COLUMN Email').terminals
 * // => ['AlterTableKeyword', 'Identifier', 'DropColumnKeyword', 'Identifier']
 * ```
 */
export function recognize(source: string, options: RecognizeOptions = {}): Recognition {
  const result = validate(source, options);
  if (!result.valid) {
    throw result.error;
  }
  return result.recognition;
}

/**
 * Like recognize(), but returns recognizer errors instead of throwing them
 *
 * Errors that are not RecognizerErrors still propagate.
 */
export function validate(source: string, options: RecognizeOptions = {}): Validation {
  const pipeline = createPipeline(options);
  const logger = pipeline.logger;
  let symbols: LexicalSymbol[] = [];
  let terminals: Terminal[] = [];

  const reject = (phase: RecognitionPhase, error: RecognizerError, offset: number): Validation => {
    logger?.warn('statement_rejected', { phase, code: error.code, message: error.message, offset });
    return { valid: false, phase, error, offset, symbols, terminals };
  };

  if (source.length > pipeline.maxSourceLength) {
    return reject('input', new SourceLengthError(pipeline.maxSourceLength), pipeline.maxSourceLength);
  }

  try {
    symbols = pipeline.tokenizer.tokenize(source);
  } catch (error) {
    if (error instanceof LexerError) {
      return reject('lexical', error, error.offset);
    }
    throw error;
  }
  logger?.debug('statement_tokenized', { symbols: symbols.length });

  try {
    terminals = pipeline.mapper.map(symbols);
  } catch (error) {
    if (error instanceof MappingError) {
      return reject('mapping', error, error.offset);
    }
    throw error;
  }

  let analysis: AnalysisResult<ParserState, Terminal>;
  try {
    analysis = pipeline.automaton.analyze(terminals);
  } catch (error) {
    if (error instanceof ParseError) {
      return reject('syntax', error, symbols[error.position]?.startOffset ?? source.length);
    }
    throw error;
  }

  logger?.info('statement_accepted', { terminals: terminals.length, steps: analysis.steps });
  return {
    valid: true,
    recognition: { source, symbols, terminals, trace: analysis.trace },
  };
}
