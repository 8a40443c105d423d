import { PatternTableConfigError } from './lexer-error.js';
import { isSymbolKind, SymbolKind } from './symbol-kind.js';

/**
 * A (kind, pattern) pair; `pattern` is regular-expression source
 */
export interface PatternDefinition {
  kind: SymbolKind;
  pattern: string;
}

export interface PatternTableOptions {
  /** Match letters regardless of case (default: true) */
  caseInsensitive?: boolean;
}

export interface PatternMatch {
  kind: SymbolKind;
  text: string;
}

interface CompiledPattern extends PatternDefinition {
  regex: RegExp;
}

/**
 * Patterns of the DDL subset, highest priority first.
 *
 * Keywords must precede identifiers: `ALTER` alone is a valid identifier.
 */
export const DEFAULT_PATTERNS: readonly PatternDefinition[] = [
  { kind: SymbolKind.KEYWORD, pattern: String.raw`\b(?:alter table|drop column)\b` },
  { kind: SymbolKind.IDENTIFIER, pattern: String.raw`[A-Za-z][A-Za-z0-9._]*` },
  { kind: SymbolKind.NUMBER, pattern: String.raw`[0-9]+` },
  { kind: SymbolKind.OPERATOR, pattern: String.raw`[=()*,]` },
  { kind: SymbolKind.STRING_LITERAL, pattern: String.raw`'[^']*'` },
  { kind: SymbolKind.WHITESPACE, pattern: String.raw`\s+` },
];

/**
 * Ordered pattern table
 *
 * Patterns are anchored: each one is tried only against the text starting
 * at the scan position, and the first kind that matches wins even when a
 * later kind would match more text.
 */
export class PatternTable {
  private readonly patterns: readonly CompiledPattern[];
  readonly caseInsensitive: boolean;

  constructor(definitions: readonly PatternDefinition[] = DEFAULT_PATTERNS, options: PatternTableOptions = {}) {
    this.caseInsensitive = options.caseInsensitive ?? true;

    if (definitions.length === 0) {
      throw new PatternTableConfigError('Pattern table must contain at least one pattern');
    }

    const seen = new Set<SymbolKind>();
    const flags = this.caseInsensitive ? 'i' : '';

    this.patterns = definitions.map(({ kind, pattern }) => {
      if (!isSymbolKind(kind)) {
        throw new PatternTableConfigError(`Unknown symbol kind '${kind}'`);
      }
      if (seen.has(kind)) {
        throw new PatternTableConfigError(`Symbol kind '${kind}' has more than one pattern`);
      }
      seen.add(kind);

      let regex: RegExp;
      try {
        regex = new RegExp(`^(?:${pattern})`, flags);
      } catch (error) {
        throw new PatternTableConfigError(`Invalid pattern for ${kind}: ${pattern}`, { cause: error });
      }
      return { kind, pattern, regex };
    });
  }

  /** Kinds in priority order */
  get kinds(): SymbolKind[] {
    return this.patterns.map((p) => p.kind);
  }

  /**
   * Match the text remaining at `offset` against each pattern in order
   */
  matchAt(source: string, offset: number): PatternMatch | null {
    const rest = source.slice(offset);

    for (const { kind, regex } of this.patterns) {
      const match = regex.exec(rest);
      if (match) {
        return { kind, text: match[0] };
      }
    }

    return null;
  }
}

export const DEFAULT_PATTERN_TABLE = new PatternTable();
