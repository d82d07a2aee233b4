/**
 * Matcher engine - unify compiled patterns against a SyntaxTree
 *
 * Every node, visited in pre-order, is a candidate root for every pattern in
 * declaration order. Unification is backtracking over generators: a node
 * matcher checks kind first, then negated fields, then absence assertions,
 * then its child sequence. The first unification found for a (node,
 * pattern) pair whose captures satisfy the pattern's predicates becomes that
 * pair's only CaptureSet; a binding the predicates reject sends the search
 * on to the next one.
 *
 * Bindings never constrain later steps, so whether a matcher can match a
 * node does not depend on what was bound before it. Failures are memoized
 * on that basis, which keeps backtracking polynomial in the tree size.
 */

import { accept } from "../predicates/evaluator.js";
import type { CompiledPattern, ChildStep, NodeMatcher, PatternMatcher, Query } from "../query/types.js";
import type { SyntaxTree } from "../treesitter/syntax-tree.js";
import type { NodeId } from "../treesitter/types.js";
import type { Capture, CaptureSet, NodeOutcome } from "./types.js";

/** Persistent list of bindings, newest first */
type Bindings = { readonly name: string; readonly id: NodeId; readonly next: Bindings } | null;

function bind(bindings: Bindings, names: readonly string[], id: NodeId): Bindings {
  let result = bindings;
  for (const name of names) {
    result = { name, id, next: result };
  }
  return result;
}

function isRepeatable(matcher: PatternMatcher): boolean {
  return matcher.quantifier === "zero-or-more" || matcher.quantifier === "one-or-more";
}

function minCount(matcher: PatternMatcher): number {
  return matcher.quantifier === "one" || matcher.quantifier === "one-or-more" ? 1 : 0;
}

/**
 * Unifies patterns against the nodes of one tree
 */
class Unifier {
  private readonly tree: SyntaxTree;
  private readonly failures: Map<PatternMatcher, Set<NodeId>> = new Map();

  constructor(tree: SyntaxTree) {
    this.tree = tree;
  }

  unify(pattern: CompiledPattern, id: NodeId): CaptureSet | null {
    for (const bindings of this.matchNode(pattern.root, id, null)) {
      const captureSet = this.toCaptureSet(pattern.index, id, bindings);
      if (accept(pattern.predicates, captureSet)) return captureSet;
    }
    return null;
  }

  /**
   * Match one node against a matcher, ignoring the matcher's quantifier and
   * field, which the enclosing child sequence handles.
   */
  private *matchNode(matcher: PatternMatcher, id: NodeId, bindings: Bindings): Generator<Bindings> {
    let failed = this.failures.get(matcher);
    if (failed?.has(id)) return;

    let produced = false;
    for (const result of this.tryNode(matcher, id, bindings)) {
      produced = true;
      yield result;
    }

    if (!produced) {
      if (!failed) {
        failed = new Set();
        this.failures.set(matcher, failed);
      }
      failed.add(id);
    }
  }

  private *tryNode(matcher: PatternMatcher, id: NodeId, bindings: Bindings): Generator<Bindings> {
    const tree = this.tree;
    switch (matcher.type) {
      case "wildcard":
        yield bind(bindings, matcher.captures, id);
        return;

      case "anonymous":
        if (!tree.isNamed(id) && tree.kindOf(id) === matcher.text) {
          yield bind(bindings, matcher.captures, id);
        }
        return;

      case "alternation":
        for (const alternative of matcher.alternatives) {
          for (const result of this.matchNode(alternative, id, bindings)) {
            yield bind(result, matcher.captures, id);
          }
        }
        return;

      case "node": {
        if (!tree.isNamed(id)) return;
        if (matcher.kind !== null && tree.kindOf(id) !== matcher.kind) return;
        if (!this.structureHolds(matcher, id)) return;

        const bound = bind(bindings, matcher.captures, id);
        if (matcher.children.length === 0 && !matcher.anchorEnd) {
          yield bound;
          return;
        }
        yield* new SequenceMatcher(this, matcher, tree.childIds(id)).match(bound);
        return;
      }
    }
  }

  /**
   * Negated fields and absence assertions
   */
  private structureHolds(matcher: NodeMatcher, id: NodeId): boolean {
    const children = this.tree.childIds(id);
    for (const field of matcher.negatedFields) {
      if (children.some((child) => this.tree.fieldOf(child) === field)) return false;
    }
    for (const absent of matcher.absent) {
      if (children.some((child) => this.matches(absent, child))) return false;
    }
    return true;
  }

  /** @internal used by SequenceMatcher */
  candidates(matcher: PatternMatcher, id: NodeId, bindings: Bindings): Generator<Bindings> {
    return this.matchNode(matcher, id, bindings);
  }

  /** @internal */
  isNamed(id: NodeId): boolean {
    return this.tree.isNamed(id);
  }

  /** @internal */
  fieldOf(id: NodeId): string | null {
    return this.tree.fieldOf(id);
  }

  private matches(matcher: PatternMatcher, id: NodeId): boolean {
    return !this.matchNode(matcher, id, null).next().done;
  }

  private toCaptureSet(patternIndex: number, rootId: NodeId, bindings: Bindings): CaptureSet {
    const collected: { name: string; id: NodeId }[] = [];
    for (let b = bindings; b !== null; b = b.next) {
      collected.push({ name: b.name, id: b.id });
    }
    // Newest first; reverse to binding order, then a stable sort by position
    collected.reverse();
    collected.sort((a, b) => a.id - b.id);

    const captures: Capture[] = collected.map((entry) => Object.freeze({ name: entry.name, node: this.tree.node(entry.id) }));
    return Object.freeze({
      patternIndex,
      root: this.tree.node(rootId),
      captures: Object.freeze(captures),
    });
  }
}

/**
 * Matches a node matcher's child steps against one node's children.
 *
 * Steps are ordered. An unanchored step may skip any siblings; an anchored
 * step may skip only anonymous siblings, unless it targets anonymous nodes
 * itself. Each repetition of an anchored step is anchored to the one
 * before it, so `. (comment)* .` admits nothing but comments.
 * Quantifiers are greedy: one more repetition is tried before moving on.
 */
class SequenceMatcher {
  private readonly unifier: Unifier;
  private readonly steps: readonly ChildStep[];
  private readonly anchorEnd: boolean;
  private readonly children: readonly NodeId[];
  private readonly failed: Set<string> = new Set();

  constructor(unifier: Unifier, matcher: NodeMatcher, children: readonly NodeId[]) {
    this.unifier = unifier;
    this.steps = matcher.children;
    this.anchorEnd = matcher.anchorEnd;
    this.children = children;
  }

  match(bindings: Bindings): Generator<Bindings> {
    return this.state(0, 0, 0, bindings);
  }

  private *state(step: number, pos: number, count: number, bindings: Bindings): Generator<Bindings> {
    const key = this.key(step, pos, count);
    if (this.failed.has(key)) return;

    let produced = false;
    for (const result of this.advance(step, pos, count, bindings)) {
      produced = true;
      yield result;
    }
    if (!produced) this.failed.add(key);
  }

  private *advance(step: number, pos: number, count: number, bindings: Bindings): Generator<Bindings> {
    if (step === this.steps.length) {
      if (!this.anchorEnd || this.noNamedFrom(pos)) yield bindings;
      return;
    }

    const { matcher, anchored } = this.steps[step];
    const max = isRepeatable(matcher) ? Infinity : 1;

    if (count < max) {
      for (let j = pos; j < this.children.length; j++) {
        const child = this.children[j];
        if (matcher.field === null || this.unifier.fieldOf(child) === matcher.field) {
          for (const result of this.unifier.candidates(matcher, child, bindings)) {
            yield* this.state(step, j + 1, count + 1, result);
          }
        }
        if (anchored && !this.skippable(matcher, child)) break;
      }
    }

    if (count >= minCount(matcher)) {
      yield* this.state(step + 1, pos, 0, bindings);
    }
  }

  private skippable(matcher: PatternMatcher, child: NodeId): boolean {
    return matcher.type !== "anonymous" && matcher.type !== "wildcard" && !this.unifier.isNamed(child);
  }

  private noNamedFrom(pos: number): boolean {
    for (let j = pos; j < this.children.length; j++) {
      if (this.unifier.isNamed(this.children[j])) return false;
    }
    return true;
  }

  /**
   * Beyond the minimum, only whether another repetition is allowed matters
   */
  private key(step: number, pos: number, count: number): string {
    const matcher = this.steps[step]?.matcher;
    const normalized = matcher && isRepeatable(matcher) ? Math.min(count, minCount(matcher)) : count;
    return `${step}:${pos}:${normalized}`;
  }
}

/**
 * Lazily yield one CaptureSet per matching (node, pattern) pair, nodes in
 * pre-order and patterns in declaration order. Calling again restarts the
 * walk from the root; neither the tree nor the query is modified.
 */
export function* evaluate(query: Query, tree: SyntaxTree): Generator<CaptureSet, void, undefined> {
  const unifier = new Unifier(tree);
  for (const id of tree.preorder()) {
    for (const pattern of query.patterns) {
      const captureSet = unifier.unify(pattern, id);
      if (captureSet) yield captureSet;
    }
  }
}

/**
 * Terminal state of a single node for each pattern of the query
 */
export function evaluateNode(query: Query, tree: SyntaxTree, id: NodeId): NodeOutcome[] {
  const unifier = new Unifier(tree);
  return query.patterns.map((pattern) => {
    const captureSet = unifier.unify(pattern, id);
    return captureSet
      ? { state: "matched" as const, patternIndex: pattern.index, captureSet }
      : { state: "rejected" as const, patternIndex: pattern.index };
  });
}
