import Database from 'better-sqlite3';
import type { CodeEntity, MethodInfo } from '../model/entity.js';
import { isEntityKind } from '../model/entity.js';
import { CodeGraphError } from '../utils/errors.js';
import { SCHEMA_DDL, SCHEMA_VERSION } from './schema.js';

interface EntityRow { name: string; kind: string }
interface InheritanceRow { entity_name: string; relation: string; type_name: string }
interface PropertyRow { entity_name: string; name: string; type: string }
interface MethodRow { id: number; entity_name: string; name: string; return_type: string | null }
interface ParameterRow { method_id: number; external_name: string | null; internal_name: string; type: string | null }
interface CallRow { method_id: number; callee: string }

/**
 * SQLite snapshot of a graph. A snapshot is replaced as a whole; the tables
 * keep list order in `position` columns so `loadGraph` returns exactly what
 * was saved.
 */
export class GraphDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.init();
  }

  private init(): void {
    this.db.exec(SCHEMA_DDL);
    this.setMetadata('schema_version', SCHEMA_VERSION);
  }

  setMetadata(key: string, value: string): void {
    this.db.prepare<[string, string]>(
      'INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)'
    ).run(key, value);
  }

  getMetadata(key: string): string | undefined {
    const row = this.db.prepare<[string], { value: string }>('SELECT value FROM metadata WHERE key = ?').get(key);
    return row?.value;
  }

  saveGraph(entities: Iterable<CodeEntity>): void {
    const insertEntity = this.db.prepare<[string, string]>('INSERT INTO entities (name, kind) VALUES (?, ?)');
    const insertInheritance = this.db.prepare<[string, string, number, string]>(
      'INSERT INTO inheritance (entity_name, relation, position, type_name) VALUES (?, ?, ?, ?)'
    );
    const insertProperty = this.db.prepare<[string, number, string, string]>(
      'INSERT INTO properties (entity_name, position, name, type) VALUES (?, ?, ?, ?)'
    );
    const insertMethod = this.db.prepare<[string, number, string, string | null]>(
      'INSERT INTO methods (entity_name, position, name, return_type) VALUES (?, ?, ?, ?)'
    );
    const insertParameter = this.db.prepare<[number | bigint, number, string | null, string, string | null]>(
      'INSERT INTO parameters (method_id, position, external_name, internal_name, type) VALUES (?, ?, ?, ?, ?)'
    );
    const insertCall = this.db.prepare<[number | bigint, number, string]>(
      'INSERT INTO calls (method_id, position, callee) VALUES (?, ?, ?)'
    );

    const tx = this.db.transaction((ents: CodeEntity[]) => {
      this.db.exec('DELETE FROM entities');

      for (const e of ents) {
        insertEntity.run(e.name, e.kind);
        e.inheritedTypes.forEach((t, i) => insertInheritance.run(e.name, 'inherits', i, t));
        e.conformedProtocols.forEach((t, i) => insertInheritance.run(e.name, 'conforms', i, t));
        e.properties.forEach((p, i) => insertProperty.run(e.name, i, p.name, p.type));

        e.methods.forEach((m, i) => {
          const methodId = insertMethod.run(e.name, i, m.name, m.returnType ?? null).lastInsertRowid;
          m.parameters.forEach((p, j) =>
            insertParameter.run(methodId, j, p.externalName ?? null, p.internalName, p.type ?? null));
          m.calls.forEach((callee, j) => insertCall.run(methodId, j, callee));
        });
      }
    });

    tx([...entities]);
    this.setMetadata('saved_at', new Date().toISOString());
  }

  /** Entities of the stored snapshot, sorted by name. */
  loadGraph(): CodeEntity[] {
    const entities = new Map<string, CodeEntity>();
    for (const row of this.db.prepare<[], EntityRow>('SELECT name, kind FROM entities ORDER BY name').all()) {
      if (!isEntityKind(row.kind)) {
        throw new CodeGraphError(`Unknown entity kind "${row.kind}" for ${row.name}`, 'CORRUPT_SNAPSHOT');
      }
      entities.set(row.name, {
        name: row.name,
        kind: row.kind,
        inheritedTypes: [],
        conformedProtocols: [],
        properties: [],
        methods: [],
      });
    }

    const inheritance = this.db.prepare<[], InheritanceRow>(
      'SELECT entity_name, relation, type_name FROM inheritance ORDER BY entity_name, relation, position'
    ).all();
    for (const row of inheritance) {
      const entity = entities.get(row.entity_name);
      if (!entity) continue;
      (row.relation === 'inherits' ? entity.inheritedTypes : entity.conformedProtocols).push(row.type_name);
    }

    const properties = this.db.prepare<[], PropertyRow>(
      'SELECT entity_name, name, type FROM properties ORDER BY entity_name, position'
    ).all();
    for (const row of properties) {
      entities.get(row.entity_name)?.properties.push({ name: row.name, type: row.type });
    }

    const methods = new Map<number, MethodInfo>();
    const methodRows = this.db.prepare<[], MethodRow>(
      'SELECT id, entity_name, name, return_type FROM methods ORDER BY entity_name, position'
    ).all();
    for (const row of methodRows) {
      const method: MethodInfo = row.return_type !== null
        ? { name: row.name, parameters: [], returnType: row.return_type, calls: [] }
        : { name: row.name, parameters: [], calls: [] };
      methods.set(row.id, method);
      entities.get(row.entity_name)?.methods.push(method);
    }

    const parameters = this.db.prepare<[], ParameterRow>(
      'SELECT method_id, external_name, internal_name, type FROM parameters ORDER BY method_id, position'
    ).all();
    for (const row of parameters) {
      methods.get(row.method_id)?.parameters.push({
        ...(row.external_name !== null ? { externalName: row.external_name } : {}),
        internalName: row.internal_name,
        ...(row.type !== null ? { type: row.type } : {}),
      });
    }

    const calls = this.db.prepare<[], CallRow>('SELECT method_id, callee FROM calls ORDER BY method_id, position').all();
    for (const row of calls) {
      methods.get(row.method_id)?.calls.push(row.callee);
    }

    return [...entities.values()];
  }

  /** Run ad-hoc SQL; statements that return no rows yield an empty list. */
  query(sql: string): Array<Record<string, unknown>> {
    const stmt = this.db.prepare<[], Record<string, unknown>>(sql);
    if (!stmt.reader) {
      stmt.run();
      return [];
    }
    return stmt.all();
  }

  close(): void {
    this.db.close();
  }
}
