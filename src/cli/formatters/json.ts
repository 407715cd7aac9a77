import type { CodeEntity, MethodInfo, ParameterInfo } from '../../model/entity.js';
import { compareNames } from '../../graph/store.js';

export type GraphJson = Record<string, CodeEntity>;

/**
 * Entity map keyed by name in ascending order, with every record's fields in a
 * fixed order and absent optionals left out. Two runs over the same input
 * serialize byte-identically.
 */
export function toGraphJson(entities: Iterable<CodeEntity>): GraphJson {
  const sorted = [...entities].sort((a, b) => compareNames(a.name, b.name));
  return Object.fromEntries(sorted.map(e => [e.name, serializeEntity(e)]));
}

export function formatJson(entities: Iterable<CodeEntity>): string {
  return JSON.stringify(toGraphJson(entities), null, 2);
}

function serializeEntity(entity: CodeEntity): CodeEntity {
  return {
    name: entity.name,
    kind: entity.kind,
    inheritedTypes: [...entity.inheritedTypes],
    conformedProtocols: [...entity.conformedProtocols],
    properties: entity.properties.map(p => ({ name: p.name, type: p.type })),
    methods: entity.methods.map(serializeMethod),
  };
}

function serializeMethod(method: MethodInfo): MethodInfo {
  return {
    name: method.name,
    parameters: method.parameters.map(serializeParameter),
    ...(method.returnType !== undefined ? { returnType: method.returnType } : {}),
    calls: [...method.calls],
  };
}

function serializeParameter(param: ParameterInfo): ParameterInfo {
  return {
    ...(param.externalName !== undefined ? { externalName: param.externalName } : {}),
    internalName: param.internalName,
    ...(param.type !== undefined ? { type: param.type } : {}),
  };
}
