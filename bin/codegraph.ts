#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { scanCommand } from '../src/cli/commands/scan.js';
import { queryCommand } from '../src/cli/commands/query.js';
import { toError } from '../src/utils/errors.js';

interface ScanCliOptions {
  output?: string;
  format: string;
  duplicates?: string;
  context?: string;
  failFast?: boolean;
  strictSyntax?: boolean;
  exclude?: string[];
  db?: string;
  verbose?: boolean;
}

interface QueryCliOptions {
  db?: string;
  format: 'terminal' | 'json';
}

async function run(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (err) {
    console.error(chalk.red(`❌ Error: ${toError(err).message}`));
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('codegraph')
  .description('Extract a type-level dependency graph from Swift sources')
  .version('0.1.0');

program
  .command('scan <root>', { isDefault: true })
  .description('Scan a directory of Swift files and write the graph as JSON')
  .option('-o, --output <file>', 'Output file, "-" for stdout (default: codegraph.json in the current directory)')
  .addOption(new Option('-f, --format <format>', 'Also print a summary: json or terminal').choices(['json', 'terminal']).default('json'))
  .addOption(new Option('--duplicates <policy>', 'Same-named entities: overwrite or merge').choices(['overwrite', 'merge']))
  .addOption(new Option('--context <mode>', 'Nested declarations: scoped or flat').choices(['scoped', 'flat']))
  .option('--fail-fast', 'Abort on the first file that cannot be read or parsed')
  .option('--strict-syntax', 'Treat files with syntax errors as parse failures')
  .option('--exclude <dir...>', 'Directory names to skip (replaces the defaults)')
  .option('--db <path>', 'Also store the graph in a SQLite database')
  .option('-v, --verbose', 'Print each file as it is parsed')
  .action(async (root: string, opts: ScanCliOptions) => {
    await run(() => scanCommand(root, opts));
  });

program
  .command('query <sql>')
  .description('Run a SQL query against a stored graph')
  .option('--db <path>', 'Graph database', 'codegraph.db')
  .addOption(new Option('-f, --format <format>', 'Output format: terminal or json').choices(['terminal', 'json']).default('terminal'))
  .action(async (sql: string, opts: QueryCliOptions) => {
    await run(() => queryCommand(sql, opts));
  });

await program.parseAsync();
