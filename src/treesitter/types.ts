/**
 * Type definitions for grammars and syntax trees
 */

import type { SyntaxTree } from "./syntax-tree.js";

/**
 * Position in source (row and column are 0-indexed)
 */
export interface Point {
  row: number;
  column: number;
}

/**
 * Half-open range `[start, end)` of string offsets into the source
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * Index of a node inside its owning SyntaxTree
 */
export type NodeId = number;

/**
 * Read-only view of one node. Views are created on demand by the tree and
 * hold only the id, never a copy of the node data.
 */
export interface SyntaxNode {
  readonly tree: SyntaxTree;
  readonly id: NodeId;
  /** Grammar-defined node type, e.g. "except_clause" */
  readonly kind: string;
  /** False for anonymous tokens such as "(" or "except" */
  readonly named: boolean;
  /** Field name this node occupies in its parent, if any */
  readonly field: string | null;
  readonly start: number;
  readonly end: number;
  readonly startPoint: Point;
  readonly endPoint: Point;
  readonly isError: boolean;
  readonly isMissing: boolean;
  readonly text: string;
  readonly parent: SyntaxNode | null;
  readonly childCount: number;
  readonly children: SyntaxNode[];
  readonly namedChildren: SyntaxNode[];
  child(index: number): SyntaxNode | null;
  childForFieldName(field: string): SyntaxNode | null;
}

/**
 * A parser for one language. Implementations return a tree (possibly
 * error-recovered) or throw ParseError when no tree can be produced.
 */
export interface Grammar {
  readonly language: string;
  readonly extensions: readonly string[];
  parse(source: string): SyntaxTree;
}

/**
 * Supported language - can be a built-in or dynamically loaded language
 */
export type SupportedLanguage = string;

/**
 * Language configuration for a tree-sitter grammar package
 */
export interface LanguageConfig {
  /** Language identifier */
  language: string;
  /** File extensions for this language */
  extensions: string[];
  /** npm package name */
  package: string;
  /** Optional: how to extract grammar from module */
  moduleExport?: string;
}
