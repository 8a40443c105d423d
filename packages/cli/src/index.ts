#!/usr/bin/env node

/**
 * ddl-pda CLI - check ALTER TABLE ... DROP COLUMN statements
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { tokensCommand } from './commands/tokens.js';

const program = new Command();

program
  .name('ddl-pda')
  .description('Recognize ALTER TABLE ... DROP COLUMN statements with a table-driven pushdown automaton')
  .version('0.1.0');

// Register commands
program.addCommand(checkCommand);
program.addCommand(tokensCommand);

// Parse arguments
await program.parseAsync();
