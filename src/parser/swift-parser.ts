import Parser from 'web-tree-sitter';
import { ParseError, toError } from '../utils/errors.js';
import { loadSwiftGrammar } from './grammar-loader.js';
import type { SyntaxNode, SyntaxTree } from './syntax.js';

/** A parsed file; its memory lives in the WASM heap until `delete()` is called. */
export interface ParsedTree extends SyntaxTree {
  delete(): void;
}

export interface ParseOptions {
  /** Reject trees that contain syntax errors instead of walking what was recovered */
  strictSyntax?: boolean;
}

/**
 * Swift source → syntax tree, via web-tree-sitter. tree-sitter recovers from
 * syntax errors, so by default a malformed file still yields a tree.
 */
export class SwiftParser {
  private constructor(private readonly parser: Parser) {}

  static async create(wasmPath?: string): Promise<SwiftParser> {
    const language = await loadSwiftGrammar(wasmPath);
    const parser = new Parser();
    parser.setLanguage(language);
    return new SwiftParser(parser);
  }

  parse(source: string, filePath: string, opts: ParseOptions = {}): ParsedTree {
    let tree: Parser.Tree | null;
    try {
      tree = this.parser.parse(source);
    } catch (err) {
      const cause = toError(err);
      throw new ParseError(`Failed to parse ${filePath}: ${cause.message}`, filePath, cause);
    }
    if (!tree) {
      throw new ParseError(`Failed to parse ${filePath}: parser returned no tree`, filePath);
    }

    if (opts.strictSyntax && tree.rootNode.hasError()) {
      const errorNode = findErrorNode(tree.rootNode);
      tree.delete();
      const where = errorNode ? ` at line ${errorNode.startPosition.row + 1}` : '';
      throw new ParseError(`Syntax error in ${filePath}${where}`, filePath);
    }

    return tree;
  }

  delete(): void {
    this.parser.delete();
  }
}

function findErrorNode(node: SyntaxNode): SyntaxNode | undefined {
  if (node.type === 'ERROR') return node;
  for (const child of node.children) {
    const found = findErrorNode(child);
    if (found) return found;
  }
  return undefined;
}
