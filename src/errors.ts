/**
 * Error taxonomy for the query engine
 *
 * Input errors (unsupported language, malformed pattern text, unknown
 * predicate) are raised eagerly at registry/compile time. Parse errors are
 * attributable to one file and are isolated by the scanner. Internal
 * consistency faults signal a compiler defect and are never swallowed.
 */

import type { Span } from "./treesitter/types.js";

export enum ScrubQueryErrorCode {
  UnsupportedLanguage = "UnsupportedLanguage",
  ParseError = "ParseError",
  QuerySyntaxError = "QuerySyntaxError",
  UnknownPredicate = "UnknownPredicate",
  QueryValidation = "QueryValidation",
  RegistrySealed = "RegistrySealed",
  GrammarUnavailable = "GrammarUnavailable",
  Config = "Config",
  InternalConsistency = "InternalConsistency",
}

/**
 * Base class for every error thrown by the engine
 */
export class ScrubQueryError extends Error {
  readonly code: ScrubQueryErrorCode;

  constructor(code: ScrubQueryErrorCode, message: string) {
    super(message);
    this.name = "ScrubQueryError";
    this.code = code;
  }
}

export class UnsupportedLanguageError extends ScrubQueryError {
  readonly language: string;

  constructor(language: string) {
    super(ScrubQueryErrorCode.UnsupportedLanguage, `No grammar registered for language '${language}'`);
    this.name = "UnsupportedLanguageError";
    this.language = language;
  }
}

export class GrammarUnavailableError extends ScrubQueryError {
  readonly language: string;
  readonly packageName: string;

  constructor(language: string, packageName: string, detail: string) {
    super(
      ScrubQueryErrorCode.GrammarUnavailable,
      `Grammar for '${language}' could not be loaded from '${packageName}': ${detail}`
    );
    this.name = "GrammarUnavailableError";
    this.language = language;
    this.packageName = packageName;
  }
}

/**
 * The grammar produced no usable tree. `span` is the furthest error
 * location known, or the whole source when nothing was recovered.
 */
export class ParseError extends ScrubQueryError {
  readonly language: string;
  readonly span: Span;
  readonly reason: string;
  readonly file: string | undefined;

  constructor(language: string, span: Span, reason: string, file?: string) {
    super(ScrubQueryErrorCode.ParseError, `Failed to parse ${file ?? "<source>"} as ${language}: ${reason}`);
    this.name = "ParseError";
    this.language = language;
    this.span = span;
    this.reason = reason;
    this.file = file;
  }

  /** Same failure, attributed to `file` */
  withFile(file: string): ParseError {
    return new ParseError(this.language, this.span, this.reason, file);
  }
}

export class QuerySyntaxError extends ScrubQueryError {
  readonly offset: number;
  readonly line: number;
  readonly column: number;

  constructor(message: string, offset: number, line: number, column: number) {
    super(ScrubQueryErrorCode.QuerySyntaxError, `${message} at ${line}:${column} (offset ${offset})`);
    this.name = "QuerySyntaxError";
    this.offset = offset;
    this.line = line;
    this.column = column;
  }
}

export class UnknownPredicateError extends ScrubQueryError {
  readonly predicateName: string;

  constructor(predicateName: string) {
    super(ScrubQueryErrorCode.UnknownPredicate, `Unknown predicate '#${predicateName}?'`);
    this.name = "UnknownPredicateError";
    this.predicateName = predicateName;
  }
}

export class QueryValidationError extends ScrubQueryError {
  constructor(message: string) {
    super(ScrubQueryErrorCode.QueryValidation, message);
    this.name = "QueryValidationError";
  }
}

export class UnboundCaptureError extends QueryValidationError {
  readonly captureName: string;

  constructor(captureName: string, context: string) {
    super(`Capture '@${captureName}' is used by ${context} but bound nowhere in the pattern`);
    this.name = "UnboundCaptureError";
    this.captureName = captureName;
  }
}

export class RegistrySealedError extends ScrubQueryError {
  constructor(language: string) {
    super(
      ScrubQueryErrorCode.RegistrySealed,
      `Cannot register '${language}': the grammar registry is sealed once parsing starts`
    );
    this.name = "RegistrySealedError";
  }
}

export class ConfigError extends ScrubQueryError {
  readonly path: string;
  readonly issues: string[];

  constructor(path: string, issues: string[]) {
    super(ScrubQueryErrorCode.Config, `Invalid configuration in ${path}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.path = path;
    this.issues = issues;
  }
}

export class InternalConsistencyError extends ScrubQueryError {
  constructor(message: string) {
    super(ScrubQueryErrorCode.InternalConsistency, message);
    this.name = "InternalConsistencyError";
  }
}

/**
 * A predicate read a capture that the match did not bind. The compiler
 * rejects such queries, so reaching this is a defect.
 */
export class MissingCaptureError extends InternalConsistencyError {
  readonly captureName: string;

  constructor(captureName: string, predicateName: string) {
    super(`Predicate '#${predicateName}?' references capture '@${captureName}' missing from the capture set`);
    this.name = "MissingCaptureError";
    this.captureName = captureName;
  }
}

/**
 * Errors that belong to a single source file and must not abort a scan
 */
export function isFileLevelError(
  err: unknown
): err is UnsupportedLanguageError | GrammarUnavailableError | ParseError {
  return (
    err instanceof UnsupportedLanguageError ||
    err instanceof GrammarUnavailableError ||
    err instanceof ParseError
  );
}
