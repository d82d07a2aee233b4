import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { readSourceUnit, Scanner, type SourceUnit } from "../../src/scan/scanner.js";
import { compile } from "../../src/query/compiler.js";
import { ParseError, UnsupportedLanguageError } from "../../src/errors.js";
import { createDefaultRegistry, GrammarRegistry } from "../../src/treesitter/grammar-registry.js";
import type { SyntaxTree } from "../../src/treesitter/syntax-tree.js";
import type { Grammar } from "../../src/treesitter/types.js";
import { buildTree, leaf, n, t } from "../helpers/tree-dsl.js";

/**
 * Space-separated words become `word` leaves and `?` an ERROR node; a
 * source starting with `!` cannot be parsed at all
 */
class WordGrammar implements Grammar {
  readonly language = "words";
  readonly extensions = [".words"];
  parses = 0;

  parse(source: string): SyntaxTree {
    this.parses++;
    if (source.startsWith("!")) {
      throw new ParseError(this.language, { start: 0, end: source.length }, "nothing recognisable");
    }
    const children = source.split(" ").map((w) => (w === "?" ? n("ERROR", t("?")) : leaf("word", w)));
    return buildTree(n("document", ...children), this.language);
  }
}

function wordsUnit(file: string, source: string): SourceUnit {
  return { language: "words", file, source };
}

function setup(): { grammar: WordGrammar; scanner: Scanner } {
  const grammar = new WordGrammar();
  const registry = new GrammarRegistry().register(grammar);
  return { grammar, scanner: new Scanner({ registry }) };
}

const words = compile("(word) @w", { id: "words", category: "word" });

describe("Scanner", () => {
  describe("per-file failures", () => {
    it("should keep scanning after a file fails to parse", async () => {
      const { scanner } = setup();
      const result = await scanner.collect([wordsUnit("good.words", "hello"), wordsUnit("bad.words", "!!")], [words]);

      expect(result.findings.map((f) => [f.span.file, f.boundText])).toEqual([["good.words", "hello"]]);
      expect(result.diagnostics).toEqual([
        {
          file: "bad.words",
          language: "words",
          code: "parse-error",
          message: "Failed to parse bad.words as words: nothing recognisable",
          span: { start: 0, end: 2 },
          recovered: false,
        },
      ]);
    });

    it("should report findings from an error-recovered tree with a diagnostic", () => {
      const { scanner } = setup();
      const result = scanner.scanUnit(wordsUnit("partial.words", "ok ?"), [words]);

      expect(result.findings.map((f) => f.boundText)).toEqual(["ok"]);
      expect(result.diagnostics).toEqual([
        {
          file: "partial.words",
          language: "words",
          code: "parse-error",
          message: "1 syntax error(s); findings come from the recovered tree",
          span: { start: 3, end: 4 },
          recovered: true,
        },
      ]);
    });

    it("should report a language without a grammar", () => {
      const { scanner } = setup();
      const result = scanner.scanUnit({ language: "cobol", file: "legacy.cbl", source: "MOVE A TO B" }, [words]);

      expect(result.findings).toEqual([]);
      expect(result.diagnostics).toEqual([
        {
          file: "legacy.cbl",
          language: "cobol",
          code: "unsupported-language",
          message: "No grammar registered for language 'cobol'",
          span: null,
          recovered: false,
        },
      ]);
    });

    it("should propagate errors that do not belong to a file", async () => {
      const registry = new GrammarRegistry().register({
        language: "words",
        extensions: [],
        parse: () => {
          throw new Error("grammar bug");
        },
      });
      const scanner = new Scanner({ registry });
      await expect(scanner.collect([wordsUnit("a.words", "a")], [words])).rejects.toThrow("grammar bug");
    });
  });

  describe("query selection", () => {
    it("should not parse a unit no query applies to", () => {
      const { grammar, scanner } = setup();
      const pythonOnly = compile("(word) @w", { language: "python" });
      const result = scanner.scanUnit(wordsUnit("a.words", "a b"), [pythonOnly]);

      expect(result).toEqual({ file: "a.words", language: "words", findings: [], diagnostics: [] });
      expect(grammar.parses).toBe(0);
    });

    it("should order findings by query, then by position", () => {
      const { scanner } = setup();
      const doc = compile("(document) @doc", { id: "doc" });
      const result = scanner.scanUnit(wordsUnit("a.words", "a b"), [words, doc]);

      expect(result.findings.map((f) => [f.queryId, f.boundText])).toEqual([
        ["words", "a"],
        ["words", "b"],
        ["doc", "a b"],
      ]);
    });

    it("should parse each unit once for every query", () => {
      const { grammar, scanner } = setup();
      scanner.scanUnit(wordsUnit("a.words", "a b"), [words, compile("(document) @doc")]);
      expect(grammar.parses).toBe(1);
    });
  });

  describe("scan", () => {
    it("should accept async sources", async () => {
      const { scanner } = setup();
      async function* units(): AsyncGenerator<SourceUnit> {
        yield wordsUnit("one.words", "a");
        yield wordsUnit("two.words", "b c");
      }
      const result = await scanner.collect(units(), [words]);
      expect(result.findings.map((f) => `${f.span.file}:${f.span.start}`)).toEqual([
        "one.words:0",
        "two.words:0",
        "two.words:2",
      ]);
    });

    it("should stop before the next unit once aborted", async () => {
      const { scanner } = setup();
      const controller = new AbortController();
      const units = [wordsUnit("a.words", "a"), wordsUnit("b.words", "b"), wordsUnit("c.words", "c")];

      const scanned: string[] = [];
      for await (const result of scanner.scan(units, [words], { signal: controller.signal })) {
        scanned.push(result.file);
        controller.abort();
      }
      expect(scanned).toEqual(["a.words"]);
    });
  });

  describe("python sources", () => {
    const registry = createDefaultRegistry();
    const scanner = new Scanner({ registry });

    it("should find a bare except clause", () => {
      const query = compile('((except_clause "except" . ":") @except.bare)', {
        category: "bare_except",
      });
      const source = "try:\n    risky()\nexcept:\n    pass\n";
      const result = scanner.scanUnit({ language: "python", file: "handler.py", source }, [query]);

      expect(result.diagnostics).toEqual([]);
      expect(result.findings).toHaveLength(1);
      const [finding] = result.findings;
      expect(finding.captureName).toBe("except.bare");
      expect(finding.span.start).toBe(17);
      expect(finding.startPoint).toEqual({ row: 2, column: 0 });
      expect(finding.boundText.trimEnd()).toBe("except:\n    pass");
      expect(finding.language).toBe("python");
    });

    it("should ignore typed except clauses", () => {
      const query = compile('((except_clause "except" . ":") @except.bare)');
      for (const type of ["ValueError", "(ValueError)", "get_exc()", "excs[0]"]) {
        const source = `try:\n    risky()\nexcept ${type}:\n    pass\n`;
        expect(scanner.scanUnit({ language: "python", file: "handler.py", source }, [query]).findings).toEqual([]);
      }
    });

    it("should find a call whose name only a later sibling satisfies", () => {
      const query = compile(
        '((module (expression_statement (call function: (identifier) @fn))) (#eq? @fn "eval") (#set! primary "fn"))'
      );
      const source = "print(a)\neval(b)\n";
      const { findings } = scanner.scanUnit({ language: "python", file: "later.py", source }, [query]);

      expect(findings.map((f) => [f.boundText, f.span.start])).toEqual([["eval", 9]]);
    });

    it("should match a credential assigned after other class attributes", () => {
      const query = compile(
        `((class_definition
            body: (block (expression_statement (assignment left: (identifier) @name right: (string)))))
          (#match? @name "(?i)password")
          (#set! primary "name"))`
      );
      const source = "class Settings:\n    name = 'x'\n    password = 'test-secret'\n";
      const { findings } = scanner.scanUnit({ language: "python", file: "settings.py", source }, [query]);

      expect(findings.map((f) => f.boundText)).toEqual(["password"]);
    });

    it("should report each eval and exec call by its name", () => {
      const query = compile(
        `((call function: (identifier) @fn)
           (#match? @fn "^(eval|exec)$")
           (#set! primary "fn")
           (#set! message "{{text}}() usage detected"))`,
        { id: "python/eval-exec", category: "eval_exec", severity: "high" }
      );
      const source = "eval(x)\nexec(y)\nprint(z)\n";
      const { findings } = scanner.scanUnit({ language: "python", file: "run.py", source }, [query]);

      expect(findings.map((f) => f.span)).toEqual([
        { file: "run.py", start: 0, end: 4 },
        { file: "run.py", start: 8, end: 12 },
      ]);
      expect(findings.map((f) => f.message)).toEqual(["eval() usage detected", "exec() usage detected"]);
      expect(findings.map((f) => f.endPoint)).toEqual([
        { row: 0, column: 4 },
        { row: 1, column: 4 },
      ]);
    });

    it("should count offsets in UTF-16 code units", () => {
      const query = compile("((call function: (identifier) @fn) (#eq? @fn \"eval\") (#set! primary \"fn\"))");
      const source = "name = \"café \u{1F600}\"\neval(name)\n";
      const [finding] = scanner.scanUnit({ language: "python", file: "u.py", source }, [query]).findings;

      expect(finding.span.start).toBe(source.indexOf("eval"));
      expect(finding.boundText).toBe("eval");
    });
  });

  describe("readSourceUnit", () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), "scrubquery-scan-"));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("should read a file and resolve its language", async () => {
      const registry = new GrammarRegistry().register(new WordGrammar());
      const path = join(dir, "sample.words");
      await writeFile(path, "one two");

      expect(await readSourceUnit(path, registry)).toEqual({ language: "words", file: path, source: "one two" });
    });

    it("should reject a file with an unknown extension", async () => {
      const registry = new GrammarRegistry().register(new WordGrammar());
      await expect(readSourceUnit(join(dir, "notes.xyz"), registry)).rejects.toBeInstanceOf(UnsupportedLanguageError);
    });
  });
});
