import type { CodeEntity, EntityKind } from '../model/entity.js';
import { extensionEntityName } from '../model/entity.js';
import type { SyntaxNode } from '../parser/syntax.js';
import { renderText } from '../parser/syntax.js';
import {
  DECLARATION_KEYWORDS,
  FIELDS,
  INHERITANCE_SPECIFIER,
  PROTOCOL_DECLARATION,
  TYPE_DECLARATION,
} from './node-types.js';

export interface InheritanceSplit {
  inheritedTypes: string[];
  conformedProtocols: string[];
}

/**
 * Kind of entity a node declares, or undefined when the node is not a tracked
 * type declaration (including `actor`).
 */
export function declarationKind(node: SyntaxNode): EntityKind | undefined {
  if (node.type === PROTOCOL_DECLARATION) return 'protocol';
  if (node.type !== TYPE_DECLARATION) return undefined;

  const keyword = node.childForFieldName(FIELDS.declarationKind);
  if (keyword) {
    return DECLARATION_KEYWORDS.get(keyword.type);
  }

  for (const child of node.children) {
    const kind = DECLARATION_KEYWORDS.get(child.type);
    if (kind) return kind;
  }
  return undefined;
}

/**
 * Build an empty entity record from a type declaration. Members are filled in
 * later by the traversal.
 */
export function makeEntity(node: SyntaxNode): CodeEntity | undefined {
  const kind = declarationKind(node);
  if (!kind) return undefined;

  const name = declaredName(node, kind);
  if (!name) return undefined;

  const { inheritedTypes, conformedProtocols } = parseInheritance(node, kind);

  return {
    name,
    kind,
    inheritedTypes,
    conformedProtocols,
    properties: [],
    methods: [],
  };
}

function declaredName(node: SyntaxNode, kind: EntityKind): string | undefined {
  const nameNode = node.childForFieldName(FIELDS.name)
    ?? node.namedChildren.find(c => c.type === (kind === 'extension' ? 'user_type' : 'type_identifier'));
  const text = renderText(nameNode);
  if (!text) return undefined;
  return kind === 'extension' ? extensionEntityName(text) : text;
}

/**
 * Split `: A, B, C` into superclass candidates and protocols.
 *
 * Positional heuristic: the first entry is treated as a superclass and the
 * rest as protocols, so `struct S: Codable, Hashable` reports `Codable` as
 * inherited. Extensions cannot add a superclass, so all of their entries are
 * conformances.
 */
export function parseInheritance(node: SyntaxNode, kind: EntityKind): InheritanceSplit {
  const typeNames = node.children
    .filter(c => c.type === INHERITANCE_SPECIFIER)
    .map(spec => renderText(spec.childForFieldName(FIELDS.inheritsFrom) ?? spec))
    .filter(name => name.length > 0);

  if (kind === 'extension') {
    return { inheritedTypes: [], conformedProtocols: typeNames };
  }

  const [first, ...rest] = typeNames;
  return {
    inheritedTypes: first === undefined ? [] : [first],
    conformedProtocols: rest,
  };
}
