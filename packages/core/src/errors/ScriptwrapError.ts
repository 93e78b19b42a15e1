/**
 * ScriptwrapError - Error hierarchy for scriptwrap
 *
 * Every error that aborts a generation run extends ScriptwrapError, so the
 * CLI can print code, context and suggestion in one place.
 *
 * Error types:
 * - ConfigError: binding configuration unreadable or invalid (fatal)
 * - FileAccessError: input or output file cannot be read/written (fatal)
 * - GraphError: type graph malformed or internally inconsistent (fatal)
 * - UnmatchedTypesError: configured types missing from the graphs (fatal)
 *
 * Recoverable problems (excluded methods, reflected fields) are not errors;
 * they are recorded as diagnostics.
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  itemId?: string;
  typeName?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of ScriptwrapError
 */
export interface ScriptwrapErrorJSON {
  code: string;
  severity: 'fatal' | 'error' | 'warning';
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all scriptwrap errors.
 */
export abstract class ScriptwrapError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'fatal' | 'error' | 'warning';
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ScriptwrapErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - YAML/JSON syntax, schema violations, duplicate types
 *
 * Codes: ERR_CONFIG_PARSE, ERR_CONFIG_INVALID, ERR_CONFIG_DUPLICATE_TYPE
 */
export class ConfigError extends ScriptwrapError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - missing input, unwritable output
 *
 * Codes: ERR_FILE_UNREADABLE, ERR_FILE_UNWRITABLE
 */
export class FileAccessError extends ScriptwrapError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Type graph error - the input document is not what the generator expects
 *
 * Codes: ERR_GRAPH_INVALID, ERR_ITEM_NOT_FOUND, ERR_PATH_NOT_FOUND,
 * ERR_UNEXPECTED_ITEM_KIND
 */
export class GraphError extends ScriptwrapError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configured type names that do not resolve to exactly one item.
 *
 * Collected over the whole configuration and thrown once, so a single run
 * reports every missing or ambiguous name.
 */
export class UnmatchedTypesError extends ScriptwrapError {
  readonly code = 'ERR_UNMATCHED_TYPES';
  readonly severity = 'fatal' as const;
  readonly missing: string[];
  readonly ambiguous: string[];

  constructor(missing: string[], ambiguous: string[] = []) {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`not found: ${missing.join(', ')}`);
    }
    if (ambiguous.length > 0) {
      parts.push(`matched more than once: ${ambiguous.join(', ')}`);
    }
    super(
      `Some configured types could not be matched in the given type graphs (${parts.join('; ')})`,
      { missing, ambiguous },
      'Check the type names and `source` fields in the binding config, or pass the missing graph files'
    );
    this.missing = missing;
    this.ambiguous = ambiguous;
  }
}
