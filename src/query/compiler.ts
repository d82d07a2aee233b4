/**
 * Query compiler - pattern text to an immutable Query
 *
 * Parsing is delegated to the query parser; this module resolves predicate
 * names, checks that every capture a predicate reads is bound, orders
 * predicates by cost and freezes the result.
 */

import {
  QueryValidationError,
  ScrubQueryError,
  UnboundCaptureError,
  UnknownPredicateError,
} from "../errors.js";
import { DEFAULT_SEVERITY, isSeverity, type Severity } from "../findings/severity.js";
import { createDefaultPredicates, type PredicateRegistry } from "../predicates/registry.js";
import { parseQuery } from "./query-parser.js";
import type {
  CompiledPattern,
  CompiledPredicate,
  ParsedPattern,
  PatternMatcher,
  PatternProperty,
  PredicateClause,
  Query,
  QueryMetadata,
} from "./types.js";

const defaultPredicates = createDefaultPredicates();

/**
 * Compile pattern text into a frozen Query.
 *
 * Metadata passed here wins over `#set!` properties of the same name.
 *
 * @throws QuerySyntaxError for malformed text
 * @throws UnknownPredicateError for a predicate missing from the registry
 * @throws QueryValidationError for unbound captures, bad arguments or metadata
 */
export function compile(
  source: string,
  metadata: QueryMetadata = {},
  predicates: PredicateRegistry = defaultPredicates
): Query {
  const parsed = parseQuery(source);
  const patterns = parsed.map((pattern, index) => compilePattern(pattern, index, predicates));

  const property = (key: string): string | undefined => firstProperty(parsed, key);

  const id = metadata.id ?? property("id") ?? "anonymous";
  const category = metadata.category ?? property("category") ?? id;
  const severity = metadata.severity ?? toSeverity(property("severity")) ?? DEFAULT_SEVERITY;

  const captureNames: string[] = [];
  for (const pattern of patterns) {
    for (const name of pattern.captureNames) {
      if (!captureNames.includes(name)) captureNames.push(name);
    }
  }

  const primaryCapture = metadata.primaryCapture ?? property("primary") ?? null;
  if (primaryCapture !== null && !captureNames.includes(primaryCapture)) {
    throw new UnboundCaptureError(primaryCapture, "the query as its primary capture");
  }

  const query: Query = {
    id,
    language: metadata.language ?? property("language") ?? null,
    category,
    severity,
    message: metadata.message ?? property("message") ?? null,
    tags: [...new Set(metadata.tags ?? [])].sort(),
    primaryCapture,
    patterns,
    captureNames,
    source,
  };
  return deepFreeze(query);
}

export interface QueryDefinition {
  source: string;
  metadata?: QueryMetadata;
  /** Where the text came from, e.g. a rule file path */
  origin?: string;
}

export interface QueryFailure {
  id: string;
  origin?: string;
  error: ScrubQueryError;
}

export interface CompileAllResult {
  queries: Query[];
  failures: QueryFailure[];
}

/**
 * Compile many queries; a malformed one is reported and skipped
 */
export function compileAll(
  definitions: readonly QueryDefinition[],
  predicates: PredicateRegistry = defaultPredicates
): CompileAllResult {
  const queries: Query[] = [];
  const failures: QueryFailure[] = [];

  for (const definition of definitions) {
    try {
      queries.push(compile(definition.source, definition.metadata, predicates));
    } catch (err) {
      if (!(err instanceof ScrubQueryError)) throw err;
      failures.push({
        id: definition.metadata?.id ?? definition.origin ?? `query-${queries.length + failures.length}`,
        origin: definition.origin,
        error: err,
      });
    }
  }

  return { queries, failures };
}

function compilePattern(pattern: ParsedPattern, index: number, predicates: PredicateRegistry): CompiledPattern {
  const captureNames = collectCaptures(pattern.root);
  const required = requiredCaptures(pattern.root);
  const optionalCaptures = captureNames.filter((name) => !required.has(name));

  for (const prop of pattern.properties) {
    if (prop.key === "severity" && (prop.value === null || !isSeverity(prop.value))) {
      throw new QueryValidationError(`Unknown severity '${prop.value ?? ""}' in pattern ${index}`);
    }
  }

  const compiled = pattern.predicates.map((clause) => compilePredicate(clause, captureNames, required, predicates));
  // Array.prototype.sort is stable, so equal costs keep their written order
  compiled.sort((a, b) => a.cost - b.cost);

  return {
    index,
    root: pattern.root,
    predicates: compiled,
    properties: pattern.properties,
    captureNames,
    optionalCaptures,
    offset: pattern.offset,
  };
}

function compilePredicate(
  clause: PredicateClause,
  captureNames: readonly string[],
  required: ReadonlySet<string>,
  predicates: PredicateRegistry
): CompiledPredicate {
  const definition = predicates.get(clause.name);
  if (!definition) {
    throw new UnknownPredicateError(clause.name);
  }

  const reads: string[] = [];
  for (const arg of clause.args) {
    if (arg.type !== "capture") continue;
    if (!captureNames.includes(arg.name)) {
      throw new UnboundCaptureError(arg.name, `'#${clause.name}?'`);
    }
    if (!reads.includes(arg.name)) reads.push(arg.name);
  }

  return {
    name: clause.name,
    args: clause.args,
    cost: definition.cost,
    requiredCaptures: reads.filter((name) => required.has(name)),
    test: definition.compile(clause.args),
  };
}

/**
 * Capture names, a matcher's own before those of its children. Captures
 * inside absence assertions can never bind and are left out.
 */
function collectCaptures(root: PatternMatcher): string[] {
  const names: string[] = [];
  const visit = (matcher: PatternMatcher): void => {
    for (const name of matcher.captures) {
      if (!names.includes(name)) names.push(name);
    }
    if (matcher.type === "node") {
      for (const step of matcher.children) visit(step.matcher);
    } else if (matcher.type === "alternation") {
      for (const alternative of matcher.alternatives) visit(alternative);
    }
  };
  visit(root);
  return names;
}

/**
 * Captures bound by every successful match of `matcher`
 */
function requiredCaptures(matcher: PatternMatcher): Set<string> {
  if (matcher.quantifier === "optional" || matcher.quantifier === "zero-or-more") {
    return new Set();
  }

  const required = new Set(matcher.captures);
  if (matcher.type === "node") {
    for (const step of matcher.children) {
      for (const name of requiredCaptures(step.matcher)) required.add(name);
    }
  } else if (matcher.type === "alternation") {
    const [first, ...rest] = matcher.alternatives.map(requiredCaptures);
    for (const name of first ?? []) {
      if (rest.every((set) => set.has(name))) required.add(name);
    }
  }
  return required;
}

function firstProperty(patterns: readonly ParsedPattern[], key: string): string | undefined {
  for (const pattern of patterns) {
    const found = pattern.properties.find((p: PatternProperty) => p.key === key && p.value !== null);
    if (found?.value) return found.value;
  }
  return undefined;
}

function toSeverity(value: string | undefined): Severity | undefined {
  if (value === undefined) return undefined;
  if (!isSeverity(value)) {
    throw new QueryValidationError(`Unknown severity '${value}'`);
  }
  return value;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
