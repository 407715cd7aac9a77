import { describe, it, expect } from 'vitest';
import { SwiftParser } from '../src/parser/swift-parser.js';
import { GrammarLoadError } from '../src/utils/errors.js';

describe('grammar loading', () => {
  it('fails with GrammarLoadError and lets a later load retry', async () => {
    await expect(SwiftParser.create('/nonexistent/tree-sitter-swift.wasm')).rejects.toBeInstanceOf(GrammarLoadError);

    const parser = await SwiftParser.create();
    try {
      const tree = parser.parse('struct Ok {}', 'Ok.swift');
      expect(tree.rootNode.type).toBe('source_file');
      tree.delete();
    } finally {
      parser.delete();
    }
  });
});
