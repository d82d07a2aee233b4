/**
 * Grammar layer: syntax trees, the grammar registry and the tree-sitter
 * adapter. Custom grammars are configured in ~/.scrubquery/config.json.
 */

export * from "./types.js";
export * from "./language-map.js";
export * from "./builtin-grammars.js";
export { SyntaxTree, SyntaxTreeBuilder, type OpenNodeOptions } from "./syntax-tree.js";
export { GrammarRegistry, createDefaultRegistry, type GrammarRegistryOptions, type DefaultRegistryOptions } from "./grammar-registry.js";
export { TreeSitterGrammar, convertTree, type TreeSitterCursor, type TreeSitterGrammarOptions } from "./tree-sitter-grammar.js";
