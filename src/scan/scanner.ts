/**
 * Scanner - runs compiled queries over source units
 *
 * Each unit is parsed once and owns its tree for the duration of the scan
 * of that unit. Failures that belong to one file become diagnostics on that
 * file; anything else, internal consistency faults included, propagates.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import {
  GrammarUnavailableError,
  isFileLevelError,
  ParseError,
  UnsupportedLanguageError,
} from "../errors.js";
import { emit } from "../findings/emitter.js";
import type { Finding } from "../findings/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { evaluate } from "../matcher/engine.js";
import type { Query } from "../query/types.js";
import type { GrammarRegistry } from "../treesitter/grammar-registry.js";
import type { SyntaxTree } from "../treesitter/syntax-tree.js";
import type { Span } from "../treesitter/types.js";

export interface SourceUnit {
  language: string;
  file: string;
  source: string;
}

export type DiagnosticCode = "parse-error" | "unsupported-language" | "grammar-unavailable";

export interface Diagnostic {
  readonly file: string;
  readonly language: string;
  readonly code: DiagnosticCode;
  readonly message: string;
  /** Furthest error location, when known */
  readonly span: Span | null;
  /** True when findings were still extracted from an error-recovered tree */
  readonly recovered: boolean;
}

export interface UnitResult {
  file: string;
  language: string;
  findings: Finding[];
  diagnostics: Diagnostic[];
}

export interface ScanResult {
  findings: Finding[];
  diagnostics: Diagnostic[];
}

export interface ScannerOptions {
  registry: GrammarRegistry;
  logger?: Logger;
}

export interface ScanOptions {
  /** Abandons the units not yet started */
  signal?: AbortSignal;
}

export class Scanner {
  private readonly registry: GrammarRegistry;
  private readonly logger: Logger;

  constructor(options: ScannerOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Scan one unit. Findings are ordered by query, then by pre-order
   * position of the match root.
   */
  scanUnit(unit: SourceUnit, queries: readonly Query[]): UnitResult {
    const result: UnitResult = { file: unit.file, language: unit.language, findings: [], diagnostics: [] };
    const relevant = queries.filter((q) => q.language === null || q.language === unit.language);
    if (relevant.length === 0) {
      this.logger.debug({ file: unit.file, language: unit.language }, "no queries for language, skipping");
      return result;
    }

    let tree: SyntaxTree;
    try {
      tree = this.registry.parse(unit.language, unit.source);
    } catch (err) {
      if (!isFileLevelError(err)) throw err;
      const failure = err instanceof ParseError ? err.withFile(unit.file) : err;
      this.logger.error({ file: unit.file, language: unit.language, code: failure.code }, failure.message);
      result.diagnostics.push(failureDiagnostic(unit, failure));
      return result;
    }

    if (tree.hasErrors) {
      const span = tree.furthestError();
      this.logger.warn({ file: unit.file, errors: tree.errorSpans.length }, "syntax errors recovered");
      result.diagnostics.push(
        Object.freeze({
          file: unit.file,
          language: unit.language,
          code: "parse-error" as const,
          message: `${tree.errorSpans.length} syntax error(s); findings come from the recovered tree`,
          span,
          recovered: true,
        })
      );
    }

    for (const query of relevant) {
      for (const captureSet of evaluate(query, tree)) {
        result.findings.push(emit(query, captureSet, unit.file));
      }
    }

    this.logger.debug({ file: unit.file, findings: result.findings.length }, "unit scanned");
    return result;
  }

  /**
   * Scan units one at a time, yielding to the event loop between them.
   * Stops before the next unit once `signal` aborts.
   */
  async *scan(
    units: Iterable<SourceUnit> | AsyncIterable<SourceUnit>,
    queries: readonly Query[],
    options: ScanOptions = {}
  ): AsyncGenerator<UnitResult, void, undefined> {
    let scanned = 0;
    for await (const unit of units) {
      if (options.signal?.aborted) {
        this.logger.debug({ scanned }, "scan aborted");
        return;
      }
      yield this.scanUnit(unit, queries);
      scanned++;
      await yieldToEventLoop();
    }
  }

  /**
   * Concatenate findings and diagnostics across units
   */
  async collect(
    units: Iterable<SourceUnit> | AsyncIterable<SourceUnit>,
    queries: readonly Query[],
    options: ScanOptions = {}
  ): Promise<ScanResult> {
    const collected: ScanResult = { findings: [], diagnostics: [] };
    for await (const result of this.scan(units, queries, options)) {
      collected.findings.push(...result.findings);
      collected.diagnostics.push(...result.diagnostics);
    }
    return collected;
  }
}

function failureDiagnostic(
  unit: SourceUnit,
  err: UnsupportedLanguageError | GrammarUnavailableError | ParseError
): Diagnostic {
  let code: DiagnosticCode = "unsupported-language";
  let span: Span | null = null;
  if (err instanceof ParseError) {
    code = "parse-error";
    span = err.span;
  } else if (err instanceof GrammarUnavailableError) {
    code = "grammar-unavailable";
  }
  return Object.freeze({ file: unit.file, language: unit.language, code, message: err.message, span, recovered: false });
}

/**
 * Read a file and resolve its language from the extension
 */
export async function readSourceUnit(path: string, registry: GrammarRegistry): Promise<SourceUnit> {
  const language = registry.getLanguageForPath(path);
  if (!language) {
    throw new UnsupportedLanguageError(extname(path) || path);
  }
  const source = await readFile(path, "utf-8");
  return { language, file: path, source };
}
