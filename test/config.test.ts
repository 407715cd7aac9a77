import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadConfig, parseConfig } from '../src/config/config.js';
import { ConfigError } from '../src/utils/errors.js';

describe('parseConfig', () => {
  it('accepts every known option', () => {
    expect(parseConfig({
      output: 'graph.json',
      duplicates: 'merge',
      context: 'flat',
      failFast: true,
      strictSyntax: false,
      exclude: ['Pods'],
    })).toEqual({
      output: 'graph.json',
      duplicates: 'merge',
      context: 'flat',
      failFast: true,
      strictSyntax: false,
      exclude: ['Pods'],
    });
  });

  it('rejects unknown options', () => {
    expect(() => parseConfig({ outputs: 'x' }, 'rc')).toThrow('rc: unknown option "outputs"');
  });

  it('rejects values outside the allowed set', () => {
    expect(() => parseConfig({ duplicates: 'append' }, 'rc')).toThrow('rc: "duplicates" must be one of overwrite, merge');
    expect(() => parseConfig({ failFast: 'yes' }, 'rc')).toThrow(ConfigError);
    expect(() => parseConfig({ exclude: ['ok', 3] }, 'rc')).toThrow('rc: "exclude" must be a list of directory names');
  });

  it('rejects a non-object document', () => {
    expect(() => parseConfig(['output'], 'rc')).toThrow('rc: expected an object');
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'codegraph-config-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('returns an empty config when no file exists', async () => {
    expect(await loadConfig(root)).toEqual({});
  });

  it('reads YAML', async () => {
    await writeFile(join(root, '.codegraphrc.yml'), 'duplicates: merge\nexclude:\n  - Vendor\n');

    expect(await loadConfig(root)).toEqual({ duplicates: 'merge', exclude: ['Vendor'] });
  });

  it('prefers the JSON file when several exist', async () => {
    await writeFile(join(root, '.codegraphrc.json'), '{"context": "flat"}');
    await writeFile(join(root, '.codegraphrc.yml'), 'context: scoped\n');

    expect(await loadConfig(root)).toEqual({ context: 'flat' });
  });

  it('treats an empty YAML file as no options', async () => {
    await writeFile(join(root, '.codegraphrc.yaml'), '');

    expect(await loadConfig(root)).toEqual({});
  });

  it('wraps syntax errors in ConfigError', async () => {
    await writeFile(join(root, '.codegraphrc.json'), '{ not json');

    await expect(loadConfig(root)).rejects.toBeInstanceOf(ConfigError);
  });
});
