/**
 * ddl-pda tokens command
 *
 * Prints the symbol table of one statement without mapping or parsing it.
 */

import { formatSymbolTable, LexerError, PatternTable, SymbolKind, Tokenizer } from '@ddl-pda/recognizer';
import { Command } from 'commander';

interface TokensOptions {
  strictCase?: boolean;
  whitespace?: boolean;
}

export function createTokenizer(options: TokensOptions = {}): Tokenizer {
  const patterns = new PatternTable(undefined, { caseInsensitive: !options.strictCase });
  return new Tokenizer(patterns, { skipKinds: options.whitespace ? [] : [SymbolKind.WHITESPACE] });
}

export const tokensCommand = new Command('tokens')
  .description('Print the symbol table of a statement')
  .argument('<statement>', 'Statement to tokenize')
  .option('--strict-case', 'Match keywords case-sensitively')
  .option('--whitespace', 'Include whitespace symbols')
  .action((statement: string, options: TokensOptions) => {
    try {
      console.log(formatSymbolTable(createTokenizer(options).tokenize(statement)));
    } catch (error) {
      if (error instanceof LexerError) {
        console.error(`Lexical error: ${error.message}`);
        process.exit(1);
      }
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });
