export const SCHEMA_VERSION = '1';

export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS entities (
  name TEXT PRIMARY KEY,
  kind TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_entities_kind ON entities(kind);

CREATE TABLE IF NOT EXISTS inheritance (
  entity_name TEXT NOT NULL REFERENCES entities(name) ON DELETE CASCADE,
  relation TEXT NOT NULL CHECK (relation IN ('inherits', 'conforms')),
  position INTEGER NOT NULL,
  type_name TEXT NOT NULL,
  PRIMARY KEY (entity_name, relation, position)
);

CREATE INDEX IF NOT EXISTS idx_inheritance_type ON inheritance(type_name);

CREATE TABLE IF NOT EXISTS properties (
  entity_name TEXT NOT NULL REFERENCES entities(name) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  name TEXT NOT NULL,
  type TEXT NOT NULL,
  PRIMARY KEY (entity_name, position)
);

CREATE TABLE IF NOT EXISTS methods (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  entity_name TEXT NOT NULL REFERENCES entities(name) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  name TEXT NOT NULL,
  return_type TEXT,
  UNIQUE(entity_name, position)
);

CREATE INDEX IF NOT EXISTS idx_methods_name ON methods(name);

CREATE TABLE IF NOT EXISTS parameters (
  method_id INTEGER NOT NULL REFERENCES methods(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  external_name TEXT,
  internal_name TEXT NOT NULL,
  type TEXT,
  PRIMARY KEY (method_id, position)
);

CREATE TABLE IF NOT EXISTS calls (
  method_id INTEGER NOT NULL REFERENCES methods(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  callee TEXT NOT NULL,
  PRIMARY KEY (method_id, position)
);

CREATE INDEX IF NOT EXISTS idx_calls_callee ON calls(callee);

CREATE TABLE IF NOT EXISTS metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;
