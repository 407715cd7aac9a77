import type { CodeEntity } from '../model/entity.js';

/**
 * What happens when an entity is registered under a name that is already
 * taken (a type and its extension never collide: extensions are keyed
 * `Extension_of_<Type>`, but two extensions of one type do).
 *
 * - `overwrite`: the newer declaration replaces the stored one, members and all.
 * - `merge`: the stored entity stays; the newer declaration's inheritance
 *   entries are unioned in and its members are appended to it.
 */
export type DuplicatePolicy = 'overwrite' | 'merge';

export const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = ['overwrite', 'merge'];

/**
 * Run-scoped mapping from entity name to entity. One store is shared by every
 * file of a run and only ever grows.
 */
export class GraphStore {
  private entities = new Map<string, CodeEntity>();

  constructor(readonly duplicates: DuplicatePolicy = 'overwrite') {}

  /**
   * Register a freshly built entity and return the record members should be
   * appended to: the entity itself, or under `merge` the one already stored.
   */
  register(entity: CodeEntity): CodeEntity {
    const existing = this.entities.get(entity.name);
    if (!existing || this.duplicates === 'overwrite') {
      this.entities.set(entity.name, entity);
      return entity;
    }

    mergeInto(existing, entity);
    return existing;
  }

  get(name: string): CodeEntity | undefined {
    return this.entities.get(name);
  }

  has(name: string): boolean {
    return this.entities.has(name);
  }

  get size(): number {
    return this.entities.size;
  }

  /** Entities sorted by name, independent of registration order. */
  sorted(): CodeEntity[] {
    return [...this.entities.values()].sort((a, b) => compareNames(a.name, b.name));
  }

  toRecord(): Record<string, CodeEntity> {
    return Object.fromEntries(this.sorted().map(e => [e.name, e]));
  }
}

function mergeInto(target: CodeEntity, source: CodeEntity): void {
  appendUnique(target.inheritedTypes, source.inheritedTypes);
  appendUnique(target.conformedProtocols, source.conformedProtocols);
  target.properties.push(...source.properties);
  target.methods.push(...source.methods);
}

function appendUnique(target: string[], values: string[]): void {
  for (const value of values) {
    if (!target.includes(value)) target.push(value);
  }
}

/** Plain code-unit order so the output does not depend on the host locale. */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
