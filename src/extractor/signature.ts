import type { MethodInfo, ParameterInfo } from '../model/entity.js';
import type { SyntaxNode } from '../parser/syntax.js';
import { renderText } from '../parser/syntax.js';
import { COMMENT_TYPES, FIELDS, PARAMETER } from './node-types.js';

export interface Signature {
  parameters: ParameterInfo[];
  returnType?: string;
}

/**
 * Read parameters and return type from a function (or protocol requirement)
 * declaration. Parameters are direct children of the declaration node, so
 * parameters of closure types nested in an annotation are not picked up.
 */
export function parseSignature(node: SyntaxNode): Signature {
  const parameters = node.children
    .filter(c => c.type === PARAMETER)
    .map(parseParameter);

  const returnType = renderText(node.childForFieldName(FIELDS.returnType));

  return returnType ? { parameters, returnType } : { parameters };
}

export function parseParameter(param: SyntaxNode): ParameterInfo {
  const external = param.childForFieldName(FIELDS.externalName);
  const internal = renderText(param.childForFieldName(FIELDS.name));
  const type = annotationText(param);

  const info: ParameterInfo = external
    ? { externalName: renderText(external), internalName: internal }
    : { internalName: internal };
  if (type) info.type = type;
  return info;
}

const TYPE_SUFFIXES = ['!', '?', '...'];

/**
 * Everything after the `:` of a parameter. `inout` and attributes such as
 * `@escaping` are siblings of the grammar's `type` field, so they are
 * collected here rather than read from the field alone.
 */
function annotationText(param: SyntaxNode): string {
  const colon = param.children.findIndex(c => c.type === ':');
  if (colon < 0) return renderText(param.childForFieldName(FIELDS.type));

  let text = '';
  for (const child of param.children.slice(colon + 1)) {
    if (COMMENT_TYPES.includes(child.type)) continue;
    const part = renderText(child);
    if (!part) continue;
    // `Int!` and `Int...` arrive as separate tokens
    text = !text || TYPE_SUFFIXES.includes(part) ? text + part : `${text} ${part}`;
  }
  return text;
}

/** A method record with an empty call list, ready to collect calls during the walk. */
export function makeMethod(node: SyntaxNode): MethodInfo | undefined {
  const name = renderText(node.childForFieldName(FIELDS.name));
  if (!name) return undefined;

  const { parameters, returnType } = parseSignature(node);
  const method: MethodInfo = { name, parameters, calls: [] };
  if (returnType !== undefined) method.returnType = returnType;
  return method;
}
