import type { EntityKind } from '../model/entity.js';

// Node and field names of the tree-sitter Swift grammar.

/** class, struct, enum, extension (and actor) share one node type */
export const TYPE_DECLARATION = 'class_declaration';
export const PROTOCOL_DECLARATION = 'protocol_declaration';

export const PROPERTY_DECLARATIONS = ['property_declaration', 'protocol_property_declaration'];
export const FUNCTION_DECLARATIONS = ['function_declaration', 'protocol_function_declaration'];

/** Bodies whose declarations are locals, not members of the enclosing type */
export const MEMBER_BODIES = [
  'init_declaration',
  'deinit_declaration',
  'subscript_declaration',
  'computed_property',
  'willset_didset_block',
  'lambda_literal',
];

export const CALL_EXPRESSION = 'call_expression';
export const CALL_SUFFIX = 'call_suffix';

export const INHERITANCE_SPECIFIER = 'inheritance_specifier';
export const PARAMETER = 'parameter';
export const PATTERN = 'pattern';
export const TYPE_ANNOTATION = 'type_annotation';
export const SIMPLE_IDENTIFIER = 'simple_identifier';
export const VALUE_BINDING_PATTERN = 'value_binding_pattern';

export const COMMENT_TYPES = ['comment', 'multiline_comment'];

export const FIELDS = {
  declarationKind: 'declaration_kind',
  name: 'name',
  inheritsFrom: 'inherits_from',
  externalName: 'external_name',
  type: 'type',
  returnType: 'return_type',
  boundIdentifier: 'bound_identifier',
} as const;

/** Declaration keywords that open a tracked entity; `actor` is deliberately absent */
export const DECLARATION_KEYWORDS = new Map<string, EntityKind>([
  ['class', 'class'],
  ['struct', 'struct'],
  ['enum', 'enum'],
  ['extension', 'extension'],
  ['protocol', 'protocol'],
]);
