import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { expectOneOf, loadConfig } from '../../config/config.js';
import type { CodeEntity } from '../../model/entity.js';
import { CONTEXT_MODES } from '../../extractor/collector.js';
import { DUPLICATE_POLICIES } from '../../graph/store.js';
import { buildCodeGraph, type FileFailure } from '../../scanner/build.js';
import { DEFAULT_EXCLUDES, discoverSwiftFiles } from '../../scanner/discover.js';
import { GraphDatabase } from '../../storage/database.js';
import { OutputError, toError } from '../../utils/errors.js';
import { normalizeFilePath, resolveOutputPath } from '../../utils/path.js';
import { formatJson } from '../formatters/json.js';
import { formatTerminal } from '../formatters/terminal.js';

export const DEFAULT_OUTPUT = 'codegraph.json';

export interface ScanOptions {
  cwd?: string;
  output?: string;
  format?: string;
  duplicates?: string;
  context?: string;
  failFast?: boolean;
  strictSyntax?: boolean;
  exclude?: string[];
  db?: string;
  verbose?: boolean;
}

export interface ScanReport {
  rootPath: string;
  files: string[];
  processed: string[];
  failures: FileFailure[];
  entityCount: number;
  /** Unset when nothing was written (no Swift files found) */
  outputPath?: string;
}

/**
 * Scan `root` for Swift files and write the dependency graph. Run-fatal
 * problems are thrown; files that fail on their own are reported and skipped
 * unless fail-fast is on.
 */
export async function scanCommand(root: string, opts: ScanOptions = {}): Promise<ScanReport> {
  const cwd = opts.cwd ?? process.cwd();
  const rootPath = resolve(cwd, root);
  const config = await loadConfig(rootPath);

  const format = expectOneOf(opts.format ?? 'json', ['json', 'terminal'] as const, 'format', 'options');
  const duplicates = expectOneOf(opts.duplicates ?? config.duplicates ?? 'overwrite', DUPLICATE_POLICIES, 'duplicates', 'options');
  const context = expectOneOf(opts.context ?? config.context ?? 'scoped', CONTEXT_MODES, 'context', 'options');
  const outputPath = opts.output !== undefined
    ? resolveOutputPath(opts.output, cwd)
    : config.output !== undefined
      ? resolveOutputPath(config.output, rootPath)
      : resolve(cwd, DEFAULT_OUTPUT);

  // keep stdout clean when the graph itself goes there
  const log = outputPath === '-' ? console.error : console.log;

  log(chalk.dim(`🔎 Scanning directory: ${rootPath}`));

  const files = await discoverSwiftFiles(rootPath, {
    exclude: opts.exclude ?? config.exclude ?? DEFAULT_EXCLUDES,
    onUnreadable: (dirPath, error) => {
      console.error(chalk.yellow(`  Skipping unreadable directory ${dirPath}: ${error.message}`));
    },
  });

  if (files.length === 0) {
    log(chalk.dim(`No .swift files found in ${rootPath}.`));
    return { rootPath, files, processed: [], failures: [], entityCount: 0 };
  }

  const result = await buildCodeGraph(files, {
    duplicates,
    context,
    failFast: opts.failFast ?? config.failFast ?? false,
    strictSyntax: opts.strictSyntax ?? config.strictSyntax ?? false,
    onFile: opts.verbose
      ? (filePath) => log(chalk.dim(`  Parsing ${normalizeFilePath(filePath, rootPath)}`))
      : undefined,
    onFileError: ({ filePath, error }) => {
      console.error(chalk.red(`  ✗ ${normalizeFilePath(filePath, rootPath)}`) + chalk.dim(` — ${error.message}`));
    },
  });

  const entities = result.store.sorted();
  await writeGraph(formatJson(entities), outputPath);

  if (opts.db) {
    saveSnapshot(resolve(cwd, opts.db), rootPath, entities);
  }

  if (format === 'terminal') {
    log(formatTerminal(entities, { fileCount: result.processed.length, failedCount: result.failures.length }));
  }

  if (outputPath !== '-') {
    log(chalk.green(`✅ Wrote ${entities.length} entit${entities.length !== 1 ? 'ies' : 'y'} to: ${outputPath}`));
  }
  if (result.failures.length > 0) {
    log(chalk.yellow(`${result.failures.length} of ${files.length} files skipped`));
  }

  return {
    rootPath,
    files,
    processed: result.processed,
    failures: result.failures,
    entityCount: entities.length,
    outputPath,
  };
}

async function writeGraph(json: string, outputPath: string): Promise<void> {
  if (outputPath === '-') {
    process.stdout.write(json + '\n');
    return;
  }
  try {
    await writeFile(outputPath, json + '\n', 'utf-8');
  } catch (err) {
    const cause = toError(err);
    throw new OutputError(`Failed to write ${outputPath}: ${cause.message}`, outputPath, cause);
  }
}

function saveSnapshot(dbPath: string, rootPath: string, entities: CodeEntity[]): void {
  let db: GraphDatabase | undefined;
  try {
    db = new GraphDatabase(dbPath);
    db.saveGraph(entities);
    db.setMetadata('root', rootPath);
  } catch (err) {
    const cause = toError(err);
    throw new OutputError(`Failed to store graph in ${dbPath}: ${cause.message}`, dbPath, cause);
  } finally {
    db?.close();
  }
}
