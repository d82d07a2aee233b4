/**
 * TreeSitterGrammar - Grammar backed by a native tree-sitter language package
 *
 * The language module is lazy-loaded on first parse. The tree-sitter tree is
 * converted into a SyntaxTree with a TreeCursor walk, which keeps anonymous
 * tokens and the field name of every child.
 */

import { createRequire } from "node:module";
import Parser from "tree-sitter";
import { GrammarUnavailableError, ParseError } from "../errors.js";
import { SyntaxTree, SyntaxTreeBuilder } from "./syntax-tree.js";
import type { Grammar, LanguageConfig, Point } from "./types.js";

const require = createRequire(import.meta.url);

/**
 * The part of tree-sitter's TreeCursor the conversion relies on
 */
export interface TreeSitterCursor {
  readonly nodeType: string;
  readonly nodeIsNamed: boolean;
  readonly nodeIsMissing?: boolean;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly startPosition: Point;
  readonly endPosition: Point;
  readonly currentFieldName: string | null | undefined;
  gotoFirstChild(): boolean;
  gotoNextSibling(): boolean;
  gotoParent(): boolean;
}

export interface TreeSitterGrammarOptions {
  /** 0 or undefined disables the timeout */
  parseTimeoutMicros?: number;
  maxSourceLength?: number;
}

/**
 * Convert a tree-sitter tree, walked from its root, into a SyntaxTree
 */
export function convertTree(language: string, source: string, cursor: TreeSitterCursor): SyntaxTree {
  const builder = new SyntaxTreeBuilder(language, source);

  for (;;) {
    builder.open(cursor.nodeType, {
      named: cursor.nodeIsNamed,
      field: cursor.currentFieldName || null,
      start: cursor.startIndex,
      startPoint: cursor.startPosition,
      isMissing: cursor.nodeIsMissing ?? false,
    });
    if (cursor.gotoFirstChild()) continue;

    builder.close(cursor.endIndex, cursor.endPosition);
    while (!cursor.gotoNextSibling()) {
      if (!cursor.gotoParent()) {
        return builder.build();
      }
      builder.close(cursor.endIndex, cursor.endPosition);
    }
  }
}

export class TreeSitterGrammar implements Grammar {
  readonly language: string;
  readonly extensions: readonly string[];
  private readonly config: LanguageConfig;
  private readonly options: TreeSitterGrammarOptions;
  private parser: Parser | null = null;

  constructor(config: LanguageConfig, options: TreeSitterGrammarOptions = {}) {
    this.language = config.language;
    this.extensions = Object.freeze([...config.extensions]);
    this.config = config;
    this.options = options;
  }

  isLoaded(): boolean {
    return this.parser !== null;
  }

  parse(source: string): SyntaxTree {
    const max = this.options.maxSourceLength;
    if (max !== undefined && source.length > max) {
      throw new ParseError(
        this.language,
        { start: max, end: source.length },
        `source length ${source.length} exceeds the limit of ${max}`
      );
    }

    const parser = this.load();
    let parsed: Parser.Tree | null;
    try {
      parsed = parser.parse(source, undefined, { bufferSize: source.length + 1 });
    } catch (err) {
      throw new ParseError(
        this.language,
        { start: 0, end: source.length },
        err instanceof Error ? err.message : String(err)
      );
    }
    if (!parsed) {
      throw new ParseError(this.language, { start: 0, end: source.length }, "parser returned no tree (timed out)");
    }

    const tree = convertTree(this.language, source, parsed.walk());
    if (tree.root.isError) {
      throw new ParseError(
        this.language,
        tree.furthestError() ?? { start: 0, end: source.length },
        "no syntax could be recovered"
      );
    }
    return tree;
  }

  /**
   * Load the language grammar and set up a parser for it
   */
  private load(): Parser {
    if (this.parser) return this.parser;

    const { package: packageName, moduleExport } = this.config;
    let grammarModule: unknown;
    try {
      grammarModule = require(packageName);
    } catch (err) {
      throw new GrammarUnavailableError(
        this.language,
        packageName,
        `${err instanceof Error ? err.message : String(err)} (run: npm install ${packageName})`
      );
    }

    // Some modules export multiple languages (e.g., typescript and tsx)
    let lang: unknown = grammarModule;
    if (moduleExport) {
      lang =
        typeof grammarModule === "object" && grammarModule !== null
          ? Reflect.get(grammarModule, moduleExport)
          : undefined;
      if (lang === undefined || lang === null) {
        throw new GrammarUnavailableError(this.language, packageName, `module does not export '${moduleExport}'`);
      }
    }

    const parser = new Parser();
    try {
      parser.setLanguage(lang);
    } catch (err) {
      throw new GrammarUnavailableError(
        this.language,
        packageName,
        `incompatible grammar: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    if (this.options.parseTimeoutMicros) {
      parser.setTimeoutMicros(this.options.parseTimeoutMicros);
    }
    this.parser = parser;
    return parser;
  }
}
