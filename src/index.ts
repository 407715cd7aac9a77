// Model types
export type { CodeEntity, EntityKind, PropertyInfo, MethodInfo, ParameterInfo } from './model/entity.js';
export { UNKNOWN_TYPE, extensionEntityName } from './model/entity.js';

// Extraction
export { collectDependencies, CONTEXT_MODES } from './extractor/collector.js';
export type { ContextMode, CollectOptions } from './extractor/collector.js';
export { makeEntity, parseInheritance } from './extractor/entity-builder.js';
export { parseSignature, makeMethod } from './extractor/signature.js';
export { parseProperties } from './extractor/properties.js';
export { renderCallee } from './extractor/calls.js';

// Graph
export { GraphStore, DUPLICATE_POLICIES } from './graph/store.js';
export type { DuplicatePolicy } from './graph/store.js';

// Parser
export type { SyntaxNode, SyntaxTree } from './parser/syntax.js';
export { SwiftParser } from './parser/swift-parser.js';
export type { ParsedTree, ParseOptions } from './parser/swift-parser.js';

// Scanning
export { discoverSwiftFiles, DEFAULT_EXCLUDES } from './scanner/discover.js';
export { buildCodeGraph, buildCodeGraphFromSources } from './scanner/build.js';
export type { BuildOptions, BuildResult, FileFailure, SourceFile } from './scanner/build.js';

// Output and storage
export { formatJson, toGraphJson } from './cli/formatters/json.js';
export { GraphDatabase } from './storage/database.js';
export { loadConfig, parseConfig } from './config/config.js';
export type { CodeGraphConfig } from './config/config.js';

// Errors
export {
  CodeGraphError,
  ConfigError,
  DiscoveryError,
  FileReadError,
  GrammarLoadError,
  OutputError,
  ParseError,
} from './utils/errors.js';
