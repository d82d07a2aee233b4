import { describe, it, expect } from "vitest";
import { evaluate, evaluateNode } from "../../src/matcher/engine.js";
import type { CaptureSet } from "../../src/matcher/types.js";
import { compile } from "../../src/query/compiler.js";
import { SyntaxTreeBuilder, type SyntaxTree } from "../../src/treesitter/syntax-tree.js";
import { buildTree, field, leaf, n, t } from "../helpers/tree-dsl.js";

// Source: "eval ( x ) print ( )"
//  0 module
//  1   call            2 identifier "eval"   3 argument_list  4 "("  5 identifier "x"  6 ")"
//  7   call            8 identifier "print"  9 argument_list 10 "(" 11 ")"
const calls = buildTree(
  n(
    "module",
    n(
      "call",
      field("function", leaf("identifier", "eval")),
      field("arguments", n("argument_list", t("("), leaf("identifier", "x"), t(")")))
    ),
    n(
      "call",
      field("function", leaf("identifier", "print")),
      field("arguments", n("argument_list", t("("), t(")")))
    )
  )
);

function run(pattern: string, tree: SyntaxTree = calls): CaptureSet[] {
  return [...evaluate(compile(pattern), tree)];
}

function roots(sets: CaptureSet[]): number[] {
  return sets.map((s) => s.root.id);
}

function bindings(set: CaptureSet): [string, string][] {
  return set.captures.map((c) => [c.name, c.node.text]);
}

describe("Matcher engine", () => {
  describe("node kinds", () => {
    it("should yield one capture set per node of the kind", () => {
      const sets = run("(call) @c");
      expect(roots(sets)).toEqual([1, 7]);
      expect(bindings(sets[0])).toEqual([["c", "eval ( x )"]]);
      expect(bindings(sets[1])).toEqual([["c", "print ( )"]]);
    });

    it("should report nested matches of the same pattern", () => {
      const sets = run("(identifier) @id");
      expect(sets.map((s) => s.root.text)).toEqual(["eval", "x", "print"]);
    });

    it("should match (_) against named nodes only and _ against every node", () => {
      expect(run("(_)")).toHaveLength(8);
      expect(run("_")).toHaveLength(calls.size);
    });

    it("should match anonymous tokens by text", () => {
      expect(roots(run('"("'))).toEqual([4, 10]);
    });
  });

  describe("fields", () => {
    it("should restrict a child matcher to its field", () => {
      const sets = run("(call function: (identifier) @fn)");
      expect(sets.map(bindings)).toEqual([[["fn", "eval"]], [["fn", "print"]]]);
      expect(run("(call arguments: (identifier))")).toEqual([]);
    });

    it("should reject nodes that have a negated field", () => {
      // Source: "f g ( )"
      const tree = buildTree(
        n(
          "module",
          n("call", field("function", leaf("identifier", "f"))),
          n(
            "call",
            field("function", leaf("identifier", "g")),
            field("arguments", n("argument_list", t("("), t(")")))
          )
        )
      );
      const sets = run("(call !arguments) @c", tree);
      expect(sets.map(bindings)).toEqual([[["c", "f"]]]);
    });
  });

  describe("child sequences", () => {
    it("should let unanchored children skip siblings", () => {
      const sets = run("(argument_list (identifier) @arg)");
      expect(roots(sets)).toEqual([3]);
      expect(bindings(sets[0])).toEqual([["arg", "x"]]);
    });

    it("should keep children in order", () => {
      expect(roots(run('(argument_list ")" "(")'))).toEqual([]);
      expect(roots(run('(argument_list "(" ")")'))).toEqual([3, 9]);
    });

    it("should anchor the first named child past anonymous tokens", () => {
      expect(roots(run("(argument_list . (identifier))"))).toEqual([3]);
      expect(run("(module . (call function: (identifier) @fn))").map(bindings)).toEqual([[["fn", "eval"]]]);
    });

    it("should not skip anything before an anchored anonymous token", () => {
      expect(roots(run('(argument_list . "(")'))).toEqual([3, 9]);
      expect(roots(run('(argument_list . ")")'))).toEqual([]);
    });

    it("should anchor the last named child", () => {
      expect(run("(module (call function: (identifier) @fn) .)").map(bindings)).toEqual([[["fn", "print"]]]);
    });

    it("should anchor adjacent siblings", () => {
      const sets = run("(module (call) @a . (call) @b)");
      expect(sets.map(bindings)).toEqual([
        [
          ["a", "eval ( x )"],
          ["b", "print ( )"],
        ],
      ]);
    });
  });

  describe("structural absence", () => {
    it("should accept nodes without a matching child", () => {
      expect(roots(run("(argument_list !(identifier))"))).toEqual([9]);
    });

    it("should reject nodes with a matching child", () => {
      expect(roots(run("(call !(identifier))"))).toEqual([]);
    });
  });

  describe("quantifiers", () => {
    it("should allow zero repetitions for *", () => {
      const sets = run("(argument_list (identifier)* @args)");
      expect(roots(sets)).toEqual([3, 9]);
      expect(sets.map(bindings)).toEqual([[["args", "x"]], []]);
    });

    it("should require one repetition for +", () => {
      expect(roots(run("(argument_list (identifier)+ @args)"))).toEqual([3]);
    });

    it("should make ? children optional", () => {
      const sets = run('(argument_list (identifier)? @arg ")")');
      expect(sets.map(bindings)).toEqual([[["arg", "x"]], []]);
    });

    it("should bind every repetition of a quantified capture", () => {
      const sets = run("(module (call function: (identifier) @fn)+)");
      expect(sets.map(bindings)).toEqual([
        [
          ["fn", "eval"],
          ["fn", "print"],
        ],
      ]);
    });

    it("should be greedy and backtrack to satisfy later steps", () => {
      // Source: "1 2 3"
      const list = buildTree(n("list", leaf("num", "1"), leaf("num", "2"), leaf("num", "3")));
      const sets = run("(list (num)* @all (num) @last)", list);
      expect(sets.map(bindings)).toEqual([
        [
          ["all", "1"],
          ["all", "2"],
          ["last", "3"],
        ],
      ]);
    });

    it("should keep repetitions of an anchored step adjacent", () => {
      // Source: "{ a b }" and "{ a call b }"
      const only = buildTree(n("block", t("{"), leaf("comment", "a"), leaf("comment", "b"), t("}")));
      const mixed = buildTree(n("block", t("{"), leaf("comment", "a"), leaf("call", "call"), leaf("comment", "b"), t("}")));
      expect(run("(block . (comment)* .)", only)).toHaveLength(1);
      expect(run("(block . (comment)* .)", mixed)).toEqual([]);
    });
  });

  describe("alternation", () => {
    it("should match any alternative and bind the shared capture", () => {
      const sets = run("[(identifier) (argument_list)] @x");
      expect(roots(sets)).toEqual([2, 3, 5, 8, 9]);
      expect(sets.map((s) => s.captures[0].node.text)).toEqual(["eval", "( x )", "x", "print", "( )"]);
    });

    it("should try alternatives in order inside a node", () => {
      const sets = run("(call function: [(attribute) @attr (identifier) @name])");
      expect(sets.map(bindings)).toEqual([[["name", "eval"]], [["name", "print"]]]);
    });
  });

  describe("traversal", () => {
    it("should visit nodes in pre-order and patterns in declaration order", () => {
      const sets = run("(call) @c (identifier) @i");
      expect(sets.map((s) => [s.root.id, s.patternIndex])).toEqual([
        [1, 0],
        [2, 1],
        [5, 1],
        [7, 0],
        [8, 1],
      ]);
    });

    it("should be lazy", () => {
      const first = evaluate(compile("(call) @c"), calls).next();
      if (first.done) throw new Error("expected a capture set");
      expect(first.value.root.id).toBe(1);
    });

    it("should yield the same sequence when evaluated again", () => {
      const query = compile("[(identifier) @id (argument_list (_)* @items)]");
      const summarize = (): unknown[] =>
        [...evaluate(query, calls)].map((s) => [s.patternIndex, s.root.id, s.captures.map((c) => [c.name, c.node.id])]);
      const first = summarize();
      expect(first.length).toBeGreaterThan(0);
      expect(summarize()).toEqual(first);
    });

    it("should walk very deep trees without overflowing the stack", () => {
      const depth = 10000;
      const builder = new SyntaxTreeBuilder("test", "x");
      for (let i = 0; i < depth; i++) builder.open("wrap", { start: 0 });
      builder.leaf("leaf", { start: 0, end: 1 });
      for (let i = 0; i < depth; i++) builder.close(1);
      const deep = builder.build();

      expect(roots(run("(leaf) @l", deep))).toEqual([depth]);
      expect(roots(run("(wrap (leaf))", deep))).toEqual([depth - 1]);
    });
  });

  describe("predicates", () => {
    it("should try later bindings when the predicates reject the first", () => {
      const sets = run('((module (call function: (identifier) @fn)) (#eq? @fn "print"))');
      expect(roots(sets)).toEqual([0]);
      expect(bindings(sets[0])).toEqual([["fn", "print"]]);
    });

    it("should reject the node when no binding satisfies the predicates", () => {
      expect(run('((module (call function: (identifier) @fn)) (#eq? @fn "input"))')).toEqual([]);
    });

    it("should keep one capture set per node when several bindings pass", () => {
      const sets = run('((module (call function: (identifier) @fn)) (#match? @fn "^(eval|print)$"))');
      expect(sets.map(bindings)).toEqual([[["fn", "eval"]]]);
    });
  });

  describe("evaluateNode", () => {
    it("should report one terminal state per pattern", () => {
      const query = compile("(call function: (identifier) @fn) (identifier) @id");

      const call = evaluateNode(query, calls, 1);
      expect(call.map((o) => o.state)).toEqual(["matched", "rejected"]);
      const matched = call[0];
      if (matched.state !== "matched") throw new Error("expected a match");
      expect(bindings(matched.captureSet)).toEqual([["fn", "eval"]]);

      expect(evaluateNode(query, calls, 2).map((o) => o.state)).toEqual(["rejected", "matched"]);
    });
  });
});
