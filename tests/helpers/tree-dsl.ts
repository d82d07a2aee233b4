/**
 * Builds small syntax trees for matcher tests without a grammar.
 *
 * The source is the text of every leaf, in pre-order, joined by single
 * spaces, so `n("call", leaf("identifier", "f"), t("("), t(")"))` has the
 * source "f ( )".
 */

import { SyntaxTree, SyntaxTreeBuilder } from "../../src/treesitter/syntax-tree.js";

export interface NodeSpec {
  kind: string;
  named: boolean;
  field: string | null;
  text: string | null;
  children: NodeSpec[];
}

/** Named interior node */
export function n(kind: string, ...children: NodeSpec[]): NodeSpec {
  return { kind, named: true, field: null, text: null, children };
}

/** Named leaf */
export function leaf(kind: string, text: string): NodeSpec {
  return { kind, named: true, field: null, text, children: [] };
}

/** Anonymous token whose kind is its text */
export function t(text: string): NodeSpec {
  return { kind: text, named: false, field: null, text, children: [] };
}

export function field(name: string, spec: NodeSpec): NodeSpec {
  return { ...spec, field: name };
}

function leafTexts(spec: NodeSpec, out: string[]): string[] {
  if (spec.text !== null) {
    out.push(spec.text);
  }
  for (const child of spec.children) leafTexts(child, out);
  return out;
}

export function buildTree(root: NodeSpec, language = "test"): SyntaxTree {
  const source = leafTexts(root, []).join(" ");
  const builder = new SyntaxTreeBuilder(language, source);
  let offset = 0;
  let first = true;

  const visit = (spec: NodeSpec): void => {
    const options = { named: spec.named, field: spec.field };
    if (spec.text !== null) {
      if (!first) offset += 1;
      first = false;
      builder.leaf(spec.kind, { ...options, start: offset, end: offset + spec.text.length });
      offset += spec.text.length;
      return;
    }
    const hasLeaf = leafTexts(spec, []).length > 0;
    builder.open(spec.kind, { ...options, start: first || !hasLeaf ? offset : offset + 1 });
    for (const child of spec.children) visit(child);
    builder.close(offset);
  };

  visit(root);
  return builder.build();
}
