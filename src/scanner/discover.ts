import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { DiscoveryError, toError } from '../utils/errors.js';
import { getExtension } from '../utils/path.js';

export const SWIFT_EXTENSION = '.swift';

/** Build products and dependency checkouts that are never part of the scanned project */
export const DEFAULT_EXCLUDES = ['.build', '.git', '.swiftpm', 'Carthage', 'DerivedData', 'Pods', 'node_modules'];

export interface DiscoverOptions {
  /** Directory names skipped wherever they appear */
  exclude?: string[];
  /** Called for a subdirectory that cannot be listed; the walk continues without it */
  onUnreadable?: (dirPath: string, error: Error) => void;
}

/**
 * Recursively list the `.swift` files under `root`, sorted, so every run
 * processes files in the same order. An unreadable root is an error; an
 * unreadable subdirectory is reported through `onUnreadable` and skipped.
 */
export async function discoverSwiftFiles(root: string, opts: DiscoverOptions = {}): Promise<string[]> {
  const rootPath = resolve(root);
  const exclude = new Set(opts.exclude ?? DEFAULT_EXCLUDES);

  try {
    const info = await stat(rootPath);
    if (!info.isDirectory()) {
      throw new DiscoveryError(`Not a directory: ${rootPath}`, rootPath);
    }
  } catch (err) {
    if (err instanceof DiscoveryError) throw err;
    const cause = toError(err);
    throw new DiscoveryError(`Cannot scan ${rootPath}: ${cause.message}`, rootPath, cause);
  }

  const files: string[] = [];
  await walk(rootPath, { exclude, onUnreadable: opts.onUnreadable }, files, true);
  return files.sort();
}

interface WalkOptions {
  exclude: Set<string>;
  onUnreadable?: (dirPath: string, error: Error) => void;
}

async function walk(dir: string, opts: WalkOptions, files: string[], isRoot: boolean): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    const cause = toError(err);
    if (isRoot) {
      throw new DiscoveryError(`Cannot list ${dir}: ${cause.message}`, dir, cause);
    }
    opts.onUnreadable?.(dir, cause);
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!opts.exclude.has(entry.name)) {
        await walk(fullPath, opts, files, false);
      }
    } else if (entry.isFile() && getExtension(entry.name) === SWIFT_EXTENSION) {
      files.push(fullPath);
    }
  }
}
