import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import chalk from 'chalk';
import { GraphDatabase } from '../../storage/database.js';
import { CodeGraphError, toError } from '../../utils/errors.js';

export const DEFAULT_DATABASE = 'codegraph.db';

export interface QueryOptions {
  cwd?: string;
  db?: string;
  format?: 'terminal' | 'json';
}

export async function queryCommand(sql: string, opts: QueryOptions = {}): Promise<Array<Record<string, unknown>>> {
  const cwd = opts.cwd ?? process.cwd();
  const dbPath = resolve(cwd, opts.db ?? DEFAULT_DATABASE);

  if (!existsSync(dbPath)) {
    throw new CodeGraphError(
      `No graph database at ${dbPath}. Run \`codegraph scan <root> --db ${opts.db ?? DEFAULT_DATABASE}\` first.`,
      'NO_DATABASE',
    );
  }

  const db = new GraphDatabase(dbPath);

  let results: Array<Record<string, unknown>>;
  try {
    results = db.query(sql);
  } catch (err) {
    const cause = toError(err);
    throw new CodeGraphError(`SQL Error: ${cause.message}`, 'SQL_ERROR', cause);
  } finally {
    db.close();
  }

  if (opts.format === 'json') {
    console.log(JSON.stringify(results, null, 2));
  } else {
    console.log(formatTable(results));
  }
  return results;
}

export function formatTable(rows: Array<Record<string, unknown>>): string {
  if (rows.length === 0) {
    return chalk.dim('No results.');
  }

  const columns = Object.keys(rows[0]);
  const header = columns.map(c => c.padEnd(20)).join(' │ ');
  const lines = [chalk.bold(header), '─'.repeat(header.length)];

  for (const row of rows) {
    lines.push(columns.map(c => String(row[c] ?? '').slice(0, 20).padEnd(20)).join(' │ '));
  }

  lines.push(chalk.dim(`\n${rows.length} row${rows.length !== 1 ? 's' : ''}`));
  return lines.join('\n');
}
