import { MissingCaptureError } from "../errors.js";
import type { CaptureSet } from "../matcher/types.js";
import type { CompiledPredicate, PredicateInput } from "../query/types.js";

/**
 * Read-only view of a capture set for predicate tests
 */
function inputFor(captureSet: CaptureSet): PredicateInput {
  return {
    texts: (name) => captureSet.captures.filter((c) => c.name === name).map((c) => c.node.text),
    childKinds: (name) =>
      captureSet.captures.filter((c) => c.name === name).map((c) => c.node.children.map((child) => child.kind)),
  };
}

/**
 * Apply predicates in order (the compiler sorts them cheapest first) and
 * stop at the first failure. An empty list accepts.
 *
 * @throws MissingCaptureError if a capture the pattern always binds is absent
 */
export function accept(predicates: readonly CompiledPredicate[], captureSet: CaptureSet): boolean {
  if (predicates.length === 0) return true;

  const input = inputFor(captureSet);
  for (const predicate of predicates) {
    for (const name of predicate.requiredCaptures) {
      if (!captureSet.captures.some((c) => c.name === name)) {
        throw new MissingCaptureError(name, predicate.name);
      }
    }
    if (!predicate.test(input)) return false;
  }
  return true;
}
