import type { PropertyInfo } from '../model/entity.js';
import { UNKNOWN_TYPE } from '../model/entity.js';
import type { SyntaxNode } from '../parser/syntax.js';
import { renderText } from '../parser/syntax.js';
import { FIELDS, PATTERN, SIMPLE_IDENTIFIER, TYPE_ANNOTATION, VALUE_BINDING_PATTERN } from './node-types.js';

const IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_]*$/u;

/**
 * Read every binding of a `var`/`let` declaration. `var x = 1, y: Int = 2`
 * yields two properties; each binding's type annotation follows its pattern
 * among the declaration's direct children. Destructuring patterns such as
 * `let (a, b) = pair` bind no single identifier and are skipped.
 */
export function parseProperties(node: SyntaxNode): PropertyInfo[] {
  const properties: PropertyInfo[] = [];
  let pending: PropertyInfo | undefined;

  for (const child of node.children) {
    if (child.type === PATTERN) {
      const name = boundIdentifier(child);
      pending = name ? { name, type: UNKNOWN_TYPE } : undefined;
      if (pending) properties.push(pending);
    } else if (child.type === TYPE_ANNOTATION && pending) {
      const type = renderText(child.childForFieldName(FIELDS.type)) || child.text.replace(/^\s*:/, '').trim();
      if (type) pending.type = type;
      pending = undefined;
    }
  }

  return properties;
}

function boundIdentifier(pattern: SyntaxNode): string | undefined {
  const bound = pattern.childForFieldName(FIELDS.boundIdentifier);
  if (bound) return renderText(bound);

  // protocol requirements wrap `var`/`let` into the pattern itself
  const named = pattern.namedChildren.filter(c => c.type !== VALUE_BINDING_PATTERN);
  if (named.length === 1 && named[0].type === SIMPLE_IDENTIFIER) {
    return renderText(named[0]);
  }
  const text = pattern.text.trim();
  return named.length === 0 && IDENTIFIER.test(text) ? text : undefined;
}
