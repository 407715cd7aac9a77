import { resolve, relative, extname, isAbsolute } from 'node:path';

/** Path of `filePath` relative to `root`, for display. */
export function normalizeFilePath(filePath: string, root: string): string {
  const abs = resolve(root, filePath);
  return relative(root, abs) || '.';
}

export function getExtension(filePath: string): string {
  return extname(filePath).toLowerCase();
}

/** `-` means standard output and is passed through untouched. */
export function resolveOutputPath(output: string, base: string): string {
  if (output === '-' || isAbsolute(output)) return output;
  return resolve(base, output);
}
