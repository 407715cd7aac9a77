import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import Parser from 'web-tree-sitter';
import { GrammarLoadError, toError } from '../utils/errors.js';

const require = createRequire(import.meta.url);

const SWIFT_WASM = 'tree-sitter-swift.wasm';

// Lazy-loaded, shared by every parser instance of the process
let swiftLanguage: Promise<Parser.Language> | undefined;

/** Location of the prebuilt Swift grammar shipped by tree-sitter-wasms. */
export function swiftGrammarPath(): string {
  const pkg = require.resolve('tree-sitter-wasms/package.json');
  return join(dirname(pkg), 'out', SWIFT_WASM);
}

export function loadSwiftGrammar(wasmPath?: string): Promise<Parser.Language> {
  if (!swiftLanguage) {
    swiftLanguage = initAndLoad(wasmPath).catch((err: unknown) => {
      // let a later call retry
      swiftLanguage = undefined;
      throw err;
    });
  }
  return swiftLanguage;
}

async function initAndLoad(wasmPath?: string): Promise<Parser.Language> {
  let path = wasmPath;
  try {
    await Parser.init();
    path ??= swiftGrammarPath();
    return await Parser.Language.load(path);
  } catch (err) {
    const cause = toError(err);
    throw new GrammarLoadError(`Failed to load Swift grammar${path ? ` from ${path}` : ''}: ${cause.message}`, cause);
  }
}
