import { describe, it, expect } from "vitest";
import { accept } from "../../src/predicates/evaluator.js";
import { createDefaultPredicates, PREDICATE_COST } from "../../src/predicates/registry.js";
import { evaluate } from "../../src/matcher/engine.js";
import { compile } from "../../src/query/compiler.js";
import { MissingCaptureError } from "../../src/errors.js";
import type { Query } from "../../src/query/types.js";
import type { SyntaxTree } from "../../src/treesitter/syntax-tree.js";
import { buildTree, field, leaf, n, t } from "../helpers/tree-dsl.js";

// Source: "eval ( 'x' ) Exec ( ) print ( y )"
//  0 module
//  1   call   2 identifier "eval"   3 argument_list  4 "("  5 string "'x'"  6 ")"
//  7   call   8 identifier "Exec"   9 argument_list 10 "(" 11 ")"
// 12   call  13 identifier "print" 14 argument_list 15 "(" 16 identifier "y" 17 ")"
const calls = buildTree(
  n(
    "module",
    n(
      "call",
      field("function", leaf("identifier", "eval")),
      field("arguments", n("argument_list", t("("), leaf("string", "'x'"), t(")")))
    ),
    n("call", field("function", leaf("identifier", "Exec")), field("arguments", n("argument_list", t("("), t(")")))),
    n(
      "call",
      field("function", leaf("identifier", "print")),
      field("arguments", n("argument_list", t("("), leaf("identifier", "y"), t(")")))
    )
  )
);

function accepted(query: Query, tree: SyntaxTree = calls): number[] {
  const roots: number[] = [];
  for (const set of evaluate(query, tree)) {
    if (accept(query.patterns[set.patternIndex].predicates, set)) roots.push(set.root.id);
  }
  return roots;
}

function acceptedTexts(source: string): string[] {
  const query = compile(source);
  return accepted(query).map((id) => calls.textOf(id));
}

describe("Predicate evaluator", () => {
  describe("#eq?", () => {
    it("should compare a capture with a string", () => {
      expect(accepted(compile('((call function: (identifier) @fn) @c (#eq? @fn "eval"))'))).toEqual([1]);
    });

    it("should compare two captures", () => {
      // Source: "x = x x = y"
      const tree = buildTree(
        n(
          "module",
          n("assignment", field("left", leaf("identifier", "x")), t("="), field("right", leaf("identifier", "x"))),
          n("assignment", field("left", leaf("identifier", "x")), t("="), field("right", leaf("identifier", "y")))
        )
      );
      const query = compile("((assignment left: (identifier) @a right: (identifier) @b) (#eq? @a @b))");
      expect(accepted(query, tree)).toEqual([1]);
    });
  });

  describe("#match?", () => {
    it("should test captured text against a regular expression", () => {
      expect(acceptedTexts('((identifier) @fn (#match? @fn "^(eval|exec)$"))')).toEqual(["eval"]);
    });

    it("should honour a leading (?i) flag", () => {
      expect(acceptedTexts('((identifier) @fn (#match? @fn "(?i)^(eval|exec)$"))')).toEqual(["eval", "Exec"]);
    });
  });

  describe("#any-of?", () => {
    it("should accept any of the listed strings", () => {
      expect(acceptedTexts('((identifier) @fn (#any-of? @fn "print" "y"))')).toEqual(["print", "y"]);
    });
  });

  describe("child kind predicates", () => {
    it("should accept nodes with a child of the kind for #has-child?", () => {
      expect(accepted(compile('((argument_list) @args (#has-child? @args "string"))'))).toEqual([3]);
    });

    it("should accept nodes without such a child for #not-has-child?", () => {
      expect(accepted(compile('((argument_list) @args (#not-has-child? @args "string"))'))).toEqual([9, 14]);
    });

    it("should see anonymous children too", () => {
      expect(accepted(compile('((argument_list) @args (#has-child? @args "(" ")"))'))).toEqual([3, 9, 14]);
    });
  });

  describe("quantified and optional captures", () => {
    it("should require every node of a quantified capture to pass", () => {
      const strict = compile('((module (call function: (identifier) @fn)+) (#match? @fn "^[a-z]+$"))');
      const relaxed = compile('((module (call function: (identifier) @fn)+) (#match? @fn "(?i)^[a-z]+$"))');
      expect(accepted(strict)).toEqual([]);
      expect(accepted(relaxed)).toEqual([0]);
    });

    it("should pass an unbound optional capture vacuously", () => {
      const query = compile(
        "((call function: (identifier) arguments: (argument_list (string)? @s)) @c (#eq? @s \"'nope'\"))"
      );
      expect(accepted(query)).toEqual([7, 12]);
    });

    it("should apply predicates to an optional capture when it is bound", () => {
      const query = compile("((call arguments: (argument_list (string)? @s)) @c (#eq? @s \"'x'\"))");
      expect(accepted(query)).toEqual([1, 7, 12]);
    });
  });

  describe("evaluation order", () => {
    it("should accept when there are no predicates", () => {
      const query = compile("(call) @c");
      const [first] = [...evaluate(query, calls)];
      expect(accept(query.patterns[0].predicates, first)).toBe(true);
    });

    it("should stop at the first failing predicate", () => {
      const seen: string[] = [];
      const predicates = createDefaultPredicates().register({
        name: "record",
        cost: PREDICATE_COST.regex + 1,
        compile: (args) => {
          const [subject] = args;
          return (input) => {
            if (subject.type === "capture") seen.push(...input.texts(subject.name));
            return true;
          };
        },
      });
      const query = compile('((identifier) @id (#record? @id) (#eq? @id "eval"))', {}, predicates);

      expect(query.patterns[0].predicates.map((p) => p.name)).toEqual(["eq", "record"]);
      expect(accepted(query).map((id) => calls.textOf(id))).toEqual(["eval"]);
      expect(seen).toEqual(["eval"]);
    });

    it("should throw when a required capture is missing from the set", () => {
      const query = compile('((identifier) @id (#eq? @id "eval"))');
      const handMade = { patternIndex: 0, root: calls.root, captures: [] };
      expect(() => accept(query.patterns[0].predicates, handMade)).toThrow(MissingCaptureError);
    });
  });
});
