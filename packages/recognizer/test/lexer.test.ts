import { describe, expect, it } from 'vitest';
import {
  EmptyLexicalMatchError,
  formatSymbolTable,
  NoLexicalMatchError,
  PatternTable,
  PatternTableConfigError,
  SymbolKind,
  Tokenizer,
} from '../src/lexer/index.js';

describe('Tokenizer', () => {
  const tokenizer = new Tokenizer();

  function kinds(input: string): string[] {
    return tokenizer.tokenize(input).map((s) => s.kind);
  }

  function texts(input: string): string[] {
    return tokenizer.tokenize(input).map((s) => s.text);
  }

  describe('statements', () => {
    it('tokenizes a complete statement with offsets', () => {
      expect(tokenizer.tokenize('ALTER TABLE Table1 DROP COLUMN Email')).toEqual([
        { kind: 'Keyword', text: 'ALTER TABLE', startOffset: 0, length: 11 },
        { kind: 'Identifier', text: 'Table1', startOffset: 12, length: 6 },
        { kind: 'Keyword', text: 'DROP COLUMN', startOffset: 19, length: 11 },
        { kind: 'Identifier', text: 'Email', startOffset: 31, length: 5 },
      ]);
    });

    it('returns no symbols for empty input', () => {
      expect(tokenizer.tokenize('')).toEqual([]);
    });

    it('returns no symbols for whitespace-only input', () => {
      expect(tokenizer.tokenize(' \t\n ')).toEqual([]);
    });
  });

  describe('priority order', () => {
    it('emits ALTER TABLE as a keyword, not an identifier', () => {
      expect(tokenizer.tokenize('ALTER TABLE')).toEqual([
        { kind: 'Keyword', text: 'ALTER TABLE', startOffset: 0, length: 11 },
      ]);
    });

    it('falls back to identifiers when the keyword is not followed by a word boundary', () => {
      expect(kinds('ALTER TABLEs')).toEqual(['Identifier', 'Identifier']);
      expect(texts('ALTER TABLEs')).toEqual(['ALTER', 'TABLEs']);
    });

    it('does not treat keywords split by extra whitespace as keywords', () => {
      expect(kinds('ALTER  TABLE')).toEqual(['Identifier', 'Identifier']);
    });

    it('matches a number before an identifier when the text starts with a digit', () => {
      expect(tokenizer.tokenize('1Table')).toEqual([
        { kind: 'Number', text: '1', startOffset: 0, length: 1 },
        { kind: 'Identifier', text: 'Table', startOffset: 1, length: 5 },
      ]);
    });

    it('takes the first matching kind rather than the longest match', () => {
      const table = new PatternTable([
        { kind: SymbolKind.IDENTIFIER, pattern: '[a-z]' },
        { kind: SymbolKind.KEYWORD, pattern: '[a-z]+' },
      ]);
      expect(new Tokenizer(table).tokenize('ab').map((s) => s.kind)).toEqual(['Identifier', 'Identifier']);
    });
  });

  describe('symbol kinds', () => {
    it('tokenizes qualified identifiers as one symbol', () => {
      expect(texts('dbo.Users_2')).toEqual(['dbo.Users_2']);
    });

    it('tokenizes operators', () => {
      expect(kinds('=(),*')).toEqual(['Operator', 'Operator', 'Operator', 'Operator', 'Operator']);
    });

    it('tokenizes string literals with their quotes', () => {
      expect(tokenizer.tokenize("'a b'")).toEqual([
        { kind: 'StringLiteral', text: "'a b'", startOffset: 0, length: 5 },
      ]);
    });

    it('matches keywords case-insensitively by default', () => {
      expect(tokenizer.tokenize('alter table')).toEqual([
        { kind: 'Keyword', text: 'alter table', startOffset: 0, length: 11 },
      ]);
    });

    it('matches keywords case-sensitively when configured', () => {
      const strict = new Tokenizer(new PatternTable(undefined, { caseInsensitive: false }));
      expect(strict.tokenize('alter table').map((s) => s.kind)).toEqual(['Identifier', 'Identifier']);
      expect(strict.tokenize('ALTER TABLE').map((s) => s.kind)).toEqual(['Keyword']);
    });
  });

  describe('whitespace', () => {
    it('never emits whitespace but advances past all of it', () => {
      expect(tokenizer.tokenize('  ALTER TABLE\tx\n')).toEqual([
        { kind: 'Keyword', text: 'ALTER TABLE', startOffset: 2, length: 11 },
        { kind: 'Identifier', text: 'x', startOffset: 14, length: 1 },
      ]);
    });

    it('scan keeps skipped whitespace and reconstructs the source', () => {
      const source = '  ALTER TABLE\tx\n';
      const scanned = tokenizer.scan(source);

      expect(scanned.map((s) => [s.kind, s.skipped])).toEqual([
        ['Whitespace', true],
        ['Keyword', false],
        ['Whitespace', true],
        ['Identifier', false],
        ['Whitespace', true],
      ]);
      expect(scanned.map((s) => s.text).join('')).toBe(source);
    });

    it('each scanned symbol starts where the previous one ended', () => {
      const scanned = tokenizer.scan("ALTER TABLE t1 = 'x' , 42 DROP COLUMN c");
      let offset = 0;
      for (const symbol of scanned) {
        expect(symbol.startOffset).toBe(offset);
        expect(symbol.length).toBe(symbol.text.length);
        offset += symbol.length;
      }
      expect(offset).toBe("ALTER TABLE t1 = 'x' , 42 DROP COLUMN c".length);
    });

    it('can emit whitespace when no kinds are skipped', () => {
      const verbose = new Tokenizer(undefined, { skipKinds: [] });
      expect(verbose.tokenize('a b').map((s) => s.kind)).toEqual(['Identifier', 'Whitespace', 'Identifier']);
    });
  });

  describe('errors', () => {
    it('throws NoLexicalMatchError with the offending offset', () => {
      let caught: unknown;
      try {
        tokenizer.tokenize('ALTER TABLE Table1 DROP COLUMN Email;');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(NoLexicalMatchError);
      if (caught instanceof NoLexicalMatchError) {
        expect(caught.offset).toBe(36);
        expect(caught.code).toBe('NO_LEXICAL_MATCH');
        expect(caught.source).toBe('ALTER TABLE Table1 DROP COLUMN Email;');
        expect(caught.message).toBe('No pattern matches ";" at offset 36');
      }
    });

    it('names the whole unmatched character when it lies outside the BMP', () => {
      let caught: unknown;
      try {
        tokenizer.tokenize('ALTER TABLE 😀');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(NoLexicalMatchError);
      if (caught instanceof NoLexicalMatchError) {
        expect(caught.character).toBe('😀');
        expect(caught.message).toBe('No pattern matches "😀" at offset 12');
      }
    });

    it('rejects an unterminated string literal', () => {
      expect(() => tokenizer.tokenize("'open")).toThrow('No pattern matches "\'" at offset 0');
    });

    it('throws EmptyLexicalMatchError when a pattern matches nothing', () => {
      const table = new PatternTable([{ kind: SymbolKind.IDENTIFIER, pattern: '[a-z]*' }]);
      expect(() => new Tokenizer(table).tokenize('1')).toThrow(EmptyLexicalMatchError);
      expect(() => new Tokenizer(table).tokenize('1')).toThrow(
        'Pattern for Identifier matched an empty string at offset 0',
      );
    });
  });
});

describe('PatternTable', () => {
  it('lists kinds in priority order', () => {
    expect(new PatternTable().kinds).toEqual([
      'Keyword',
      'Identifier',
      'Number',
      'Operator',
      'StringLiteral',
      'Whitespace',
    ]);
  });

  it('matches only at the given offset', () => {
    const table = new PatternTable();
    expect(table.matchAt('x 42', 2)).toEqual({ kind: 'Number', text: '42' });
    expect(table.matchAt('x 42', 1)).toEqual({ kind: 'Whitespace', text: ' ' });
    expect(table.matchAt(';x', 0)).toBeNull();
  });

  it('rejects an empty table', () => {
    expect(() => new PatternTable([])).toThrow(PatternTableConfigError);
  });

  it('rejects duplicate kinds', () => {
    expect(
      () =>
        new PatternTable([
          { kind: SymbolKind.NUMBER, pattern: '[0-9]+' },
          { kind: SymbolKind.NUMBER, pattern: '[0-9]' },
        ]),
    ).toThrow("Symbol kind 'Number' has more than one pattern");
  });

  it('rejects patterns that do not compile', () => {
    expect(() => new PatternTable([{ kind: SymbolKind.NUMBER, pattern: '(' }])).toThrow(
      'Invalid pattern for Number: (',
    );
  });
});

describe('formatSymbolTable', () => {
  it('renders kind, lexeme, start and length columns', () => {
    const symbols = new Tokenizer().tokenize('ALTER TABLE t');
    expect(formatSymbolTable(symbols).split('\n')).toEqual([
      'Kind           Lexeme               Start    Length',
      'Keyword        ALTER TABLE          0        11',
      'Identifier     t                    12       1',
    ]);
  });
});
