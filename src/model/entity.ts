export type EntityKind = 'class' | 'struct' | 'enum' | 'protocol' | 'extension';

export const ENTITY_KINDS: readonly EntityKind[] = ['class', 'struct', 'enum', 'protocol', 'extension'];

/** Sentinel type for a property declared without a type annotation. */
export const UNKNOWN_TYPE = 'Unknown';

/**
 * A top-level type declaration (class, struct, enum, protocol or extension).
 *
 * `inheritedTypes` / `conformedProtocols` come from a positional heuristic over
 * the inheritance clause: the first entry is taken to be a superclass, the rest
 * protocols. Swift's grammar does not tell them apart, so both lists are
 * approximate.
 */
export interface CodeEntity {
  /** Declared name, or `Extension_of_<Type>` for an extension */
  name: string;
  kind: EntityKind;
  inheritedTypes: string[];
  conformedProtocols: string[];
  properties: PropertyInfo[];
  methods: MethodInfo[];
}

export interface PropertyInfo {
  name: string;
  /** Annotation text, or `Unknown` when the declaration has none */
  type: string;
}

export interface MethodInfo {
  name: string;
  parameters: ParameterInfo[];
  returnType?: string;
  /** Callee texts in traversal order; duplicates are kept */
  calls: string[];
}

export interface ParameterInfo {
  /** Only present when the parameter declares both a label and a name */
  externalName?: string;
  internalName: string;
  type?: string;
}

export function extensionEntityName(extendedType: string): string {
  return `Extension_of_${extendedType.trim()}`;
}

export function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some(kind => kind === value);
}
