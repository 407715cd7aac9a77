import { describe, it, expect } from 'vitest';
import { GraphStore, compareNames } from '../src/graph/store.js';
import type { CodeEntity } from '../src/model/entity.js';

function makeEntity(name: string, overrides: Partial<CodeEntity> = {}): CodeEntity {
  return {
    name,
    kind: 'class',
    inheritedTypes: [],
    conformedProtocols: [],
    properties: [],
    methods: [],
    ...overrides,
  };
}

describe('GraphStore', () => {
  it('replaces an entity registered twice under overwrite', () => {
    const store = new GraphStore();
    store.register(makeEntity('Foo', { properties: [{ name: 'a', type: 'Int' }] }));
    const second = makeEntity('Foo', { kind: 'struct' });

    expect(store.register(second)).toBe(second);
    expect(store.size).toBe(1);
    expect(store.get('Foo')).toBe(second);
    expect(store.get('Foo')?.properties).toEqual([]);
  });

  it('unions inheritance and appends members under merge', () => {
    const store = new GraphStore('merge');
    const first = makeEntity('Extension_of_Foo', {
      kind: 'extension',
      conformedProtocols: ['Codable'],
      properties: [{ name: 'a', type: 'Int' }],
    });
    store.register(first);

    const live = store.register(makeEntity('Extension_of_Foo', {
      kind: 'extension',
      conformedProtocols: ['Codable', 'Hashable'],
      properties: [{ name: 'b', type: 'String' }],
      methods: [{ name: 'run', parameters: [], calls: [] }],
    }));

    expect(live).toBe(first);
    expect(first.conformedProtocols).toEqual(['Codable', 'Hashable']);
    expect(first.properties.map(p => p.name)).toEqual(['a', 'b']);
    expect(first.methods.map(m => m.name)).toEqual(['run']);
  });

  it('keeps the first kind when merging', () => {
    const store = new GraphStore('merge');
    store.register(makeEntity('Foo', { kind: 'struct' }));
    store.register(makeEntity('Foo', { kind: 'class' }));

    expect(store.get('Foo')?.kind).toBe('struct');
  });

  it('sorts by code unit, independent of registration order', () => {
    const store = new GraphStore();
    for (const name of ['beta', 'Zeta', 'alpha', 'Alpha']) {
      store.register(makeEntity(name));
    }

    expect(store.sorted().map(e => e.name)).toEqual(['Alpha', 'Zeta', 'alpha', 'beta']);
    expect(Object.keys(store.toRecord())).toEqual(['Alpha', 'Zeta', 'alpha', 'beta']);
  });

  it('compares names without locale rules', () => {
    expect(compareNames('B', 'a')).toBe(-1);
    expect(compareNames('a', 'B')).toBe(1);
    expect(compareNames('x', 'x')).toBe(0);
  });
});
