import type { GraphStore } from '../src/graph/store.js';
import type { CodeEntity } from '../src/model/entity.js';
import type { SyntaxNode } from '../src/parser/syntax.js';
import { buildCodeGraphFromSources, type BuildOptions } from '../src/scanner/build.js';

/** Parse one in-memory Swift file and return the resulting store. */
export async function extract(source: string, opts: BuildOptions = {}): Promise<GraphStore> {
  const result = await buildCodeGraphFromSources([{ filePath: 'Test.swift', content: source }], opts);
  return result.store;
}

export function entity(store: GraphStore, name: string): CodeEntity {
  const found = store.get(name);
  if (!found) {
    throw new Error(`No entity "${name}"; have: ${store.sorted().map(e => e.name).join(', ')}`);
  }
  return found;
}

interface FakeNodeInit {
  text?: string;
  named?: boolean;
  fields?: Record<string, SyntaxNode>;
  children?: SyntaxNode[];
}

/**
 * Hand-built syntax node. As in tree-sitter a field is only a label, so field
 * nodes must also appear in `children`.
 */
export function fakeNode(type: string, init: FakeNodeInit = {}): SyntaxNode & { named: boolean } {
  const fields = init.fields ?? {};
  const children: Array<SyntaxNode & { named?: boolean }> = init.children ?? [];
  return {
    type,
    named: init.named ?? true,
    text: init.text ?? children.map(c => c.text).join(' '),
    startPosition: { row: 0, column: 0 },
    children,
    namedChildren: children.filter(c => c.named !== false),
    childForFieldName: (name: string) => fields[name] ?? null,
  };
}

/** Anonymous (keyword / punctuation) token. */
export function token(text: string): SyntaxNode & { named: boolean } {
  return fakeNode(text, { text, named: false });
}
