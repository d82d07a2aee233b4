import type { SyntaxNode } from "../treesitter/types.js";

export interface Capture {
  readonly name: string;
  readonly node: SyntaxNode;
}

/**
 * Bindings of one successful match, valid only while its tree is alive.
 * Captures are in tree order; a quantified capture appears once per node.
 */
export interface CaptureSet {
  readonly patternIndex: number;
  readonly root: SyntaxNode;
  readonly captures: readonly Capture[];
}

/**
 * Terminal state of one node for one pattern
 */
export type NodeOutcome =
  | { readonly state: "matched"; readonly patternIndex: number; readonly captureSet: CaptureSet }
  | { readonly state: "rejected"; readonly patternIndex: number };

/**
 * Nodes bound to `name`, in tree order
 */
export function capturedNodes(set: CaptureSet, name: string): SyntaxNode[] {
  return set.captures.filter((c) => c.name === name).map((c) => c.node);
}

export function firstCapture(set: CaptureSet, name: string): SyntaxNode | undefined {
  return set.captures.find((c) => c.name === name)?.node;
}
