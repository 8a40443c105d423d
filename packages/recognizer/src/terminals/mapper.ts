import type { LexicalSymbol } from '../lexer/symbol.js';
import { SymbolKind } from '../lexer/symbol-kind.js';
import { UnmappedKeywordError, UnsupportedSymbolKindError } from './mapping-error.js';

export interface TerminalMapperConfig<T extends string> {
  /** Exact, case-sensitive keyword text to terminal */
  keywords: Readonly<Record<string, T>>;
  /** Terminal every identifier maps to */
  identifier: T;
}

/**
 * Projects tokenizer output onto a grammar's terminal alphabet
 *
 * Only the terminal kind survives; identifier text is not carried forward.
 * End of input is not appended; the automaton observes it.
 */
export class TerminalMapper<T extends string> {
  private readonly keywords: ReadonlyMap<string, T>;
  private readonly identifier: T;

  constructor(config: TerminalMapperConfig<T>) {
    this.keywords = new Map(Object.entries(config.keywords));
    this.identifier = config.identifier;
  }

  map(symbols: readonly LexicalSymbol[]): T[] {
    return symbols.map((symbol) => this.mapSymbol(symbol));
  }

  private mapSymbol(symbol: LexicalSymbol): T {
    switch (symbol.kind) {
      case SymbolKind.KEYWORD: {
        const terminal = this.keywords.get(symbol.text);
        if (terminal === undefined) {
          throw new UnmappedKeywordError(symbol.text, symbol.startOffset);
        }
        return terminal;
      }
      case SymbolKind.IDENTIFIER:
        return this.identifier;
      default:
        throw new UnsupportedSymbolKindError(symbol.kind, symbol.text, symbol.startOffset);
    }
  }
}
