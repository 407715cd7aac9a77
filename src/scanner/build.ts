import { readFile } from 'node:fs/promises';
import { GraphStore, type DuplicatePolicy } from '../graph/store.js';
import { collectDependencies, type ContextMode } from '../extractor/collector.js';
import { SwiftParser, type ParsedTree } from '../parser/swift-parser.js';
import { FileReadError, ParseError, toError } from '../utils/errors.js';

export interface SourceFile {
  filePath: string;
  content: string;
}

export type FileError = FileReadError | ParseError;

export interface FileFailure {
  filePath: string;
  error: FileError;
}

export interface BuildOptions {
  duplicates?: DuplicatePolicy;
  context?: ContextMode;
  /** Abort on the first file that cannot be read or parsed, instead of skipping it */
  failFast?: boolean;
  strictSyntax?: boolean;
  /** Reuse a parser; otherwise one is created for the run and released after it */
  parser?: SwiftParser;
  onFile?: (filePath: string) => void;
  onFileError?: (failure: FileFailure) => void;
}

export interface BuildResult {
  store: GraphStore;
  /** Files whose entities made it into the store, in processing order */
  processed: string[];
  failures: FileFailure[];
}

/**
 * Read, parse and walk `filePaths` into one graph.
 *
 * Files are read concurrently but parsed and walked one at a time in the given
 * order, so the store has a single writer and the duplicate policy resolves
 * the same way on every run.
 */
export async function buildCodeGraph(filePaths: string[], opts: BuildOptions = {}): Promise<BuildResult> {
  const reads = await Promise.allSettled(filePaths.map(readSource));

  const inputs = reads.map((read, i): SourceFile | FileFailure => {
    const filePath = filePaths[i];
    if (read.status === 'fulfilled') {
      return { filePath, content: read.value };
    }
    return { filePath, error: new FileReadError(filePath, toError(read.reason)) };
  });

  return processInOrder(inputs, opts);
}

// fatal: malformed UTF-8 is a read failure rather than U+FFFD in the source
const utf8 = new TextDecoder('utf-8', { fatal: true });

async function readSource(filePath: string): Promise<string> {
  return utf8.decode(await readFile(filePath));
}

/** Same as `buildCodeGraph` for sources already in memory. */
export function buildCodeGraphFromSources(sources: SourceFile[], opts: BuildOptions = {}): Promise<BuildResult> {
  return processInOrder(sources, opts);
}

async function processInOrder(inputs: Array<SourceFile | FileFailure>, opts: BuildOptions): Promise<BuildResult> {
  const store = new GraphStore(opts.duplicates);
  const processed: string[] = [];
  const failures: FileFailure[] = [];

  const parser = opts.parser ?? await SwiftParser.create();
  try {
    for (const input of inputs) {
      const failure = 'error' in input
        ? input
        : extractFile(parser, store, input, opts);

      if (failure) {
        if (opts.failFast) throw failure.error;
        failures.push(failure);
        opts.onFileError?.(failure);
        continue;
      }
      processed.push(input.filePath);
    }
  } finally {
    if (!opts.parser) parser.delete();
  }

  return { store, processed, failures };
}

function extractFile(
  parser: SwiftParser,
  store: GraphStore,
  source: SourceFile,
  opts: BuildOptions,
): FileFailure | undefined {
  opts.onFile?.(source.filePath);

  let tree: ParsedTree;
  try {
    tree = parser.parse(source.content, source.filePath, { strictSyntax: opts.strictSyntax });
  } catch (err) {
    if (err instanceof ParseError) return { filePath: source.filePath, error: err };
    throw err;
  }

  try {
    collectDependencies(tree, store, { context: opts.context });
  } finally {
    tree.delete();
  }
  return undefined;
}
