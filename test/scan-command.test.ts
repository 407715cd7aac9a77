import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DEFAULT_OUTPUT, scanCommand } from '../src/cli/commands/scan.js';
import { queryCommand } from '../src/cli/commands/query.js';
import { ConfigError, DiscoveryError } from '../src/utils/errors.js';

describe('scanCommand', () => {
  let cwd: string;
  let root: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'codegraph-scan-'));
    root = join(cwd, 'project');
    await mkdir(join(root, 'Sources'), { recursive: true });
    await mkdir(join(root, 'Pods', 'Vendor'), { recursive: true });
    await writeFile(join(root, 'Sources', 'Feed.swift'), [
      'class Feed: Base, Refreshing {',
      '  var items: [Item] = []',
      '  func refresh() { loader.load() }',
      '}',
    ].join('\n'));
    await writeFile(join(root, 'Pods', 'Vendor', 'Vendor.swift'), 'class Vendored {}');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(cwd, { recursive: true, force: true });
  });

  it('writes codegraph.json into the working directory', async () => {
    const report = await scanCommand('project', { cwd });
    const outputPath = join(cwd, DEFAULT_OUTPUT);

    expect(report.outputPath).toBe(outputPath);
    expect(report.files).toEqual([join(root, 'Sources', 'Feed.swift')]);
    expect(report.entityCount).toBe(1);

    const graph: unknown = JSON.parse(await readFile(outputPath, 'utf-8'));
    expect(graph).toEqual({
      Feed: {
        name: 'Feed',
        kind: 'class',
        inheritedTypes: ['Base'],
        conformedProtocols: ['Refreshing'],
        properties: [{ name: 'items', type: '[Item]' }],
        methods: [{ name: 'refresh', parameters: [], calls: ['loader.load'] }],
      },
    });
  });

  it('writes nothing when the root has no Swift files', async () => {
    const empty = join(cwd, 'empty');
    await mkdir(empty);

    const report = await scanCommand(empty, { cwd });

    expect(report.outputPath).toBeUndefined();
    expect(report.files).toEqual([]);
    expect(existsSync(join(cwd, DEFAULT_OUTPUT))).toBe(false);
  });

  it('resolves a configured output against the scanned root', async () => {
    await writeFile(join(root, '.codegraphrc.json'), '{"output": "out/graph.json", "exclude": []}');
    await mkdir(join(root, 'out'));

    const report = await scanCommand(root, { cwd });

    expect(report.outputPath).toBe(join(root, 'out', 'graph.json'));
    expect(report.files).toHaveLength(2);
    expect(existsSync(join(root, 'out', 'graph.json'))).toBe(true);
  });

  it('lets command-line options override the config file', async () => {
    await writeFile(join(root, '.codegraphrc.json'), '{"output": "ignored.json"}');

    const report = await scanCommand(root, { cwd, output: 'cli.json' });

    expect(report.outputPath).toBe(join(cwd, 'cli.json'));
    expect(existsSync(join(root, 'ignored.json'))).toBe(false);
  });

  it('fails for a missing root', async () => {
    await expect(scanCommand('missing', { cwd })).rejects.toBeInstanceOf(DiscoveryError);
  });

  it('rejects an invalid option value', async () => {
    await expect(scanCommand(root, { cwd, duplicates: 'append' })).rejects.toBeInstanceOf(ConfigError);
  });

  it('stores a snapshot that the query command can read', async () => {
    await scanCommand(root, { cwd, db: 'graph.db' });

    const rows = await queryCommand('SELECT name, kind FROM entities', { cwd, db: 'graph.db', format: 'json' });
    expect(rows).toEqual([{ name: 'Feed', kind: 'class' }]);
  });
});

describe('queryCommand', () => {
  it('fails when there is no database', async () => {
    const cwd = await mkdtemp(join(tmpdir(), 'codegraph-query-'));
    try {
      await expect(queryCommand('SELECT 1', { cwd })).rejects.toThrow(/^No graph database at /);
    } finally {
      await rm(cwd, { recursive: true, force: true });
    }
  });
});
