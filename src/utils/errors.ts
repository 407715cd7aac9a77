/**
 * Error classes for a codegraph run.
 *
 * Every error carries a `code` for reporting and an optional `cause`. Whether
 * an error ends the run or only skips one file is decided by the scanner, not
 * by the error itself.
 */
export class CodeGraphError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;

  constructor(message: string, code: string = 'CODEGRAPH_ERROR', cause?: Error) {
    super(message);
    this.name = 'CodeGraphError';
    this.code = code;
    this.cause = cause;

    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ConfigError extends CodeGraphError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/** The scan root is missing, not a directory, or cannot be listed. */
export class DiscoveryError extends CodeGraphError {
  public readonly rootPath: string;

  constructor(message: string, rootPath: string, cause?: Error) {
    super(message, 'DISCOVERY_ERROR', cause);
    this.name = 'DiscoveryError';
    this.rootPath = rootPath;
  }
}

export class FileReadError extends CodeGraphError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    super(`Failed to read ${filePath}${cause ? `: ${cause.message}` : ''}`, 'FILE_READ_ERROR', cause);
    this.name = 'FileReadError';
    this.filePath = filePath;
  }
}

/** The parser produced no tree, or (in strict mode) the tree contains syntax errors. */
export class ParseError extends CodeGraphError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: Error) {
    super(message, 'PARSE_ERROR', cause);
    this.name = 'ParseError';
    this.filePath = filePath;
  }
}

export class OutputError extends CodeGraphError {
  public readonly outputPath: string;

  constructor(message: string, outputPath: string, cause?: Error) {
    super(message, 'OUTPUT_ERROR', cause);
    this.name = 'OutputError';
    this.outputPath = outputPath;
  }
}

/** The Swift grammar could not be loaded; no file can be parsed, so the run ends. */
export class GrammarLoadError extends CodeGraphError {
  constructor(message: string, cause?: Error) {
    super(message, 'GRAMMAR_LOAD_ERROR', cause);
    this.name = 'GrammarLoadError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
