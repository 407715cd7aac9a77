/**
 * The slice of a tree-sitter node the extractor reads. web-tree-sitter's
 * `SyntaxNode` satisfies it structurally; tests and other parsers can hand in
 * anything else with the same shape.
 */
export interface SyntaxNode {
  type: string;
  text: string;
  startPosition: { row: number; column: number };
  children: SyntaxNode[];
  namedChildren: SyntaxNode[];
  childForFieldName(name: string): SyntaxNode | null;
}

export interface SyntaxTree {
  rootNode: SyntaxNode;
}

/** Node text with surrounding whitespace removed, the way every name and type is rendered. */
export function renderText(node: SyntaxNode | null | undefined): string {
  return node ? node.text.trim() : '';
}
