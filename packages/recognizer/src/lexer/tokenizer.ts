import { EmptyLexicalMatchError, NoLexicalMatchError } from './lexer-error.js';
import { DEFAULT_PATTERN_TABLE, type PatternTable } from './pattern-table.js';
import { createSymbol, type LexicalSymbol, type ScannedSymbol } from './symbol.js';
import { SymbolKind } from './symbol-kind.js';

export interface TokenizerOptions {
  /** Kinds that advance the scan but are left out of tokenize() output */
  skipKinds?: readonly SymbolKind[];
}

/**
 * Pattern-table tokenizer
 *
 * Scans from offset 0, taking at each position the first pattern in the
 * table that matches there, until the source is consumed.
 */
export class Tokenizer {
  readonly patterns: PatternTable;
  private readonly skipKinds: ReadonlySet<SymbolKind>;

  constructor(patterns: PatternTable = DEFAULT_PATTERN_TABLE, options: TokenizerOptions = {}) {
    this.patterns = patterns;
    this.skipKinds = new Set(options.skipKinds ?? [SymbolKind.WHITESPACE]);
  }

  /**
   * Tokenize a statement, dropping skipped kinds
   */
  tokenize(source: string): LexicalSymbol[] {
    return this.scan(source)
      .filter((symbol) => !symbol.skipped)
      .map(({ kind, text, startOffset }) => createSymbol(kind, text, startOffset));
  }

  /**
   * Scan a statement, keeping every match in order
   *
   * Concatenating the `text` of the result reproduces `source`.
   */
  scan(source: string): ScannedSymbol[] {
    const symbols: ScannedSymbol[] = [];
    let offset = 0;

    while (offset < source.length) {
      const match = this.patterns.matchAt(source, offset);
      if (!match) {
        throw new NoLexicalMatchError(source, offset);
      }
      if (match.text.length === 0) {
        throw new EmptyLexicalMatchError(source, offset, match.kind);
      }

      symbols.push({
        ...createSymbol(match.kind, match.text, offset),
        skipped: this.skipKinds.has(match.kind),
      });
      offset += match.text.length;
    }

    return symbols;
  }
}
