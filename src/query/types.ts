/**
 * Type definitions for compiled queries
 *
 * A pattern is a tree of tagged matcher records; predicates are tagged
 * clauses resolved against a registry of known tests. Nothing in a query is
 * evaluated as code.
 */

import type { Severity } from "../findings/severity.js";

export type Quantifier = "one" | "optional" | "zero-or-more" | "one-or-more";

interface MatcherBase {
  /** Capture names bound to the node this matcher accepts */
  readonly captures: readonly string[];
  /** Field the matched child must occupy in its parent */
  readonly field: string | null;
  readonly quantifier: Quantifier;
  /** Offset of the matcher in the query source */
  readonly offset: number;
}

/**
 * `(kind ...)`, or `(_ ...)` for any named node when `kind` is null
 */
export interface NodeMatcher extends MatcherBase {
  readonly type: "node";
  readonly kind: string | null;
  readonly children: readonly ChildStep[];
  /** `.` before the closing paren: last named child */
  readonly anchorEnd: boolean;
  /** `!field`: the node has no child in this field */
  readonly negatedFields: readonly string[];
  /** `!(kind ...)`: no direct child matches any of these */
  readonly absent: readonly PatternMatcher[];
}

/**
 * `"text"`: an anonymous token such as a keyword or punctuation
 */
export interface AnonymousMatcher extends MatcherBase {
  readonly type: "anonymous";
  readonly text: string;
}

/**
 * `_`: any node, named or anonymous
 */
export interface WildcardMatcher extends MatcherBase {
  readonly type: "wildcard";
}

/**
 * `[ a b ... ]`: the first alternative that matches
 */
export interface AlternationMatcher extends MatcherBase {
  readonly type: "alternation";
  readonly alternatives: readonly PatternMatcher[];
}

export type PatternMatcher = NodeMatcher | AnonymousMatcher | WildcardMatcher | AlternationMatcher;

/**
 * One child matcher in a node's child sequence. Anchored steps must align
 * with the next named child; unanchored steps may skip siblings.
 */
export interface ChildStep {
  readonly matcher: PatternMatcher;
  readonly anchored: boolean;
}

export type PredicateArg =
  | { readonly type: "capture"; readonly name: string }
  | { readonly type: "string"; readonly value: string };

/**
 * A predicate clause as written, before resolution
 */
export interface PredicateClause {
  readonly name: string;
  readonly args: readonly PredicateArg[];
  readonly offset: number;
}

/**
 * `(#set! key value)`
 */
export interface PatternProperty {
  readonly key: string;
  readonly value: string | null;
}

/**
 * Parsed but unvalidated pattern
 */
export interface ParsedPattern {
  readonly root: PatternMatcher;
  readonly predicates: readonly PredicateClause[];
  readonly properties: readonly PatternProperty[];
  readonly offset: number;
}

/**
 * Resolved predicate, ready to evaluate
 */
export interface CompiledPredicate {
  readonly name: string;
  readonly args: readonly PredicateArg[];
  readonly cost: number;
  /** Captures the predicate reads that every match of the pattern binds */
  readonly requiredCaptures: readonly string[];
  readonly test: PredicateTest;
}

/**
 * What a predicate test sees of a capture set
 */
export interface PredicateInput {
  /** Text of every node bound to `name`, in tree order */
  texts(name: string): readonly string[];
  /** Kinds of the direct children of every node bound to `name` */
  childKinds(name: string): readonly (readonly string[])[];
}

export type PredicateTest = (input: PredicateInput) => boolean;

export interface CompiledPattern {
  readonly index: number;
  readonly root: PatternMatcher;
  /** Sorted cheapest first */
  readonly predicates: readonly CompiledPredicate[];
  readonly properties: readonly PatternProperty[];
  /** Every capture name bound somewhere in the pattern */
  readonly captureNames: readonly string[];
  /** Captures that some successful match may leave unbound */
  readonly optionalCaptures: readonly string[];
  readonly offset: number;
}

/**
 * Query metadata supplied by the caller or by `#set!` directives
 */
export interface QueryMetadata {
  id?: string;
  language?: string;
  category?: string;
  severity?: Severity;
  message?: string;
  tags?: readonly string[];
  /** Capture reported as the finding; defaults to the pattern root */
  primaryCapture?: string;
}

export interface Query {
  readonly id: string;
  readonly language: string | null;
  readonly category: string;
  readonly severity: Severity;
  readonly message: string | null;
  readonly tags: readonly string[];
  readonly primaryCapture: string | null;
  readonly patterns: readonly CompiledPattern[];
  readonly captureNames: readonly string[];
  readonly source: string;
}
