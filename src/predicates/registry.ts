/**
 * PredicateRegistry - Named post-match tests over captured nodes
 *
 * The set is closed by default (eq, match, any-of, has-child, not-has-child)
 * and extended only by registering a definition before compiling queries
 * that use it. Each definition checks its arguments once, at compile time,
 * and returns a test closed over them.
 *
 * A quantified capture passes only when every bound node passes; an
 * optional capture left unbound passes vacuously.
 */

import { QueryValidationError } from "../errors.js";
import type { PredicateArg, PredicateInput, PredicateTest } from "../query/types.js";

export interface PredicateDefinition {
  /** Name without the leading `#` or trailing `?` */
  readonly name: string;
  /** Relative evaluation cost; cheaper predicates run first */
  readonly cost: number;
  /** Validate arguments and build the test; throw QueryValidationError on bad arguments */
  compile(args: readonly PredicateArg[]): PredicateTest;
}

export const PREDICATE_COST = {
  structural: 0,
  equality: 1,
  regex: 3,
} as const;

export class PredicateRegistry {
  private readonly definitions: Map<string, PredicateDefinition> = new Map();

  register(definition: PredicateDefinition): this {
    this.definitions.set(definition.name, definition);
    return this;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  get(name: string): PredicateDefinition | undefined {
    return this.definitions.get(name);
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }
}

function captureArg(name: string, arg: PredicateArg | undefined, position: string): string {
  if (!arg || arg.type !== "capture") {
    throw new QueryValidationError(`'#${name}?' expects a capture as its ${position} argument`);
  }
  return arg.name;
}

function stringArgs(name: string, args: readonly PredicateArg[], min: number): string[] {
  const values: string[] = [];
  for (const arg of args) {
    if (arg.type !== "string") {
      throw new QueryValidationError(`'#${name}?' expects string arguments after the capture, found '@${arg.name}'`);
    }
    values.push(arg.value);
  }
  if (values.length < min) {
    throw new QueryValidationError(`'#${name}?' expects at least ${min} string argument(s)`);
  }
  return values;
}

/**
 * Compile a pattern, turning a leading `(?i)` into the `i` flag
 */
export function compileRegex(pattern: string): RegExp {
  let source = pattern;
  let flags = "";
  if (source.startsWith("(?i)")) {
    source = source.slice(4);
    flags += "i";
  }
  try {
    return new RegExp(source, flags);
  } catch (err) {
    throw new QueryValidationError(
      `Invalid regular expression '${pattern}': ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

const eq: PredicateDefinition = {
  name: "eq",
  cost: PREDICATE_COST.equality,
  compile(args) {
    if (args.length !== 2) {
      throw new QueryValidationError(`'#eq?' takes exactly 2 arguments, got ${args.length}`);
    }
    const subject = captureArg("eq", args[0], "first");
    const other = args[1];
    if (other.type === "capture") {
      return (input: PredicateInput) => {
        const expected = input.texts(other.name);
        return input.texts(subject).every((text) => expected.every((value) => value === text));
      };
    }
    return (input: PredicateInput) => input.texts(subject).every((text) => text === other.value);
  },
};

const match: PredicateDefinition = {
  name: "match",
  cost: PREDICATE_COST.regex,
  compile(args) {
    if (args.length !== 2) {
      throw new QueryValidationError(`'#match?' takes exactly 2 arguments, got ${args.length}`);
    }
    const subject = captureArg("match", args[0], "first");
    const [pattern] = stringArgs("match", args.slice(1), 1);
    const regex = compileRegex(pattern);
    return (input: PredicateInput) => input.texts(subject).every((text) => regex.test(text));
  },
};

const anyOf: PredicateDefinition = {
  name: "any-of",
  cost: PREDICATE_COST.equality,
  compile(args) {
    const subject = captureArg("any-of", args[0], "first");
    const allowed = new Set(stringArgs("any-of", args.slice(1), 1));
    return (input: PredicateInput) => input.texts(subject).every((text) => allowed.has(text));
  },
};

function childKindPredicate(name: string, wanted: boolean): PredicateDefinition {
  return {
    name,
    cost: PREDICATE_COST.structural,
    compile(args) {
      const subject = captureArg(name, args[0], "first");
      const kinds = new Set(stringArgs(name, args.slice(1), 1));
      return (input: PredicateInput) =>
        input.childKinds(subject).every((children) => children.some((kind) => kinds.has(kind)) === wanted);
    },
  };
}

export const BUILTIN_PREDICATES: readonly PredicateDefinition[] = [
  eq,
  match,
  anyOf,
  childKindPredicate("has-child", true),
  childKindPredicate("not-has-child", false),
];

export function createDefaultPredicates(): PredicateRegistry {
  const registry = new PredicateRegistry();
  for (const definition of BUILTIN_PREDICATES) {
    registry.register(definition);
  }
  return registry;
}
