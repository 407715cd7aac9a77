import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import { CONTEXT_MODES, type ContextMode } from '../extractor/collector.js';
import { DUPLICATE_POLICIES, type DuplicatePolicy } from '../graph/store.js';
import { ConfigError, toError } from '../utils/errors.js';

export interface CodeGraphConfig {
  /** Output file; relative paths resolve against the scanned root */
  output?: string;
  duplicates?: DuplicatePolicy;
  context?: ContextMode;
  failFast?: boolean;
  strictSyntax?: boolean;
  /** Directory names to skip, replacing the defaults */
  exclude?: string[];
}

/** Looked up in this order in the scanned root; the first one found wins. */
export const CONFIG_FILES = ['.codegraphrc.json', '.codegraphrc.yml', '.codegraphrc.yaml', '.codegraphrc'];

export async function loadConfig(root: string): Promise<CodeGraphConfig> {
  const configFile = CONFIG_FILES
    .map(name => resolve(root, name))
    .find(path => existsSync(path));

  if (!configFile) return {};

  let raw: unknown;
  try {
    const content = await readFile(configFile, 'utf-8');
    raw = /\.ya?ml$/.test(configFile) ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    const cause = toError(err);
    throw new ConfigError(`Invalid config file ${configFile}: ${cause.message}`, cause);
  }

  return parseConfig(raw ?? {}, configFile);
}

export function parseConfig(raw: unknown, source: string = 'config'): CodeGraphConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${source}: expected an object`);
  }

  const config: CodeGraphConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'output':
        config.output = expectString(value, key, source);
        break;
      case 'duplicates':
        config.duplicates = expectOneOf(value, DUPLICATE_POLICIES, key, source);
        break;
      case 'context':
        config.context = expectOneOf(value, CONTEXT_MODES, key, source);
        break;
      case 'failFast':
        config.failFast = expectBoolean(value, key, source);
        break;
      case 'strictSyntax':
        config.strictSyntax = expectBoolean(value, key, source);
        break;
      case 'exclude':
        if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
          throw new ConfigError(`${source}: "exclude" must be a list of directory names`);
        }
        config.exclude = value;
        break;
      default:
        throw new ConfigError(`${source}: unknown option "${key}"`);
    }
  }

  return config;
}

function expectString(value: unknown, key: string, source: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${source}: "${key}" must be a non-empty string`);
  }
  return value;
}

function expectBoolean(value: unknown, key: string, source: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${source}: "${key}" must be true or false`);
  }
  return value;
}

export function expectOneOf<T extends string>(value: unknown, allowed: readonly T[], key: string, source: string): T {
  const match = allowed.find(a => a === value);
  if (match === undefined) {
    throw new ConfigError(`${source}: "${key}" must be one of ${allowed.join(', ')}`);
  }
  return match;
}
