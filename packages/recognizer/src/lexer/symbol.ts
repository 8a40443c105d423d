import type { SymbolKind } from './symbol-kind.js';

/**
 * A symbol produced by the tokenizer
 */
export interface LexicalSymbol {
  /** The kind whose pattern matched */
  kind: SymbolKind;
  /** The matched text, exactly as it appears in the source */
  text: string;
  /** 0-based offset of the first character in the source */
  startOffset: number;
  /** Always text.length */
  length: number;
}

/**
 * A symbol together with whether the tokenizer drops it from its output
 */
export interface ScannedSymbol extends LexicalSymbol {
  skipped: boolean;
}

export function createSymbol(kind: SymbolKind, text: string, startOffset: number): LexicalSymbol {
  return { kind, text, startOffset, length: text.length };
}
