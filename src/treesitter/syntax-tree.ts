/**
 * SyntaxTree - immutable arena of parsed nodes
 *
 * Nodes are stored once, in pre-order, and addressed by integer id. Every
 * other component holds ids or lightweight views that point back into the
 * tree, so nothing outlives the tree that owns it.
 */

import type { NodeId, Point, Span, SyntaxNode } from "./types.js";

/** @internal Storage for one node; read through SyntaxNode views */
export interface NodeRecord {
  kind: string;
  named: boolean;
  field: string | null;
  parent: NodeId;
  children: NodeId[];
  start: number;
  end: number;
  startPoint: Point;
  endPoint: Point;
  isError: boolean;
  isMissing: boolean;
}

const NO_PARENT = -1;

export class SyntaxTree {
  readonly language: string;
  readonly source: string;
  private readonly records: readonly NodeRecord[];
  private readonly errors: readonly Span[];

  /** Use SyntaxTreeBuilder */
  constructor(language: string, source: string, records: NodeRecord[]) {
    if (records.length === 0) {
      throw new Error("SyntaxTree requires a root node");
    }
    this.language = language;
    this.source = source;
    for (const record of records) {
      Object.freeze(record.children);
      Object.freeze(record);
    }
    this.records = Object.freeze(records);
    this.errors = Object.freeze(
      records
        .filter((r) => r.isError || r.isMissing)
        .map((r) => Object.freeze({ start: r.start, end: r.end }))
    );
    Object.freeze(this);
  }

  get root(): SyntaxNode {
    return this.node(0);
  }

  /** Number of nodes, anonymous tokens included */
  get size(): number {
    return this.records.length;
  }

  get hasErrors(): boolean {
    return this.errors.length > 0;
  }

  /** Spans of ERROR and MISSING nodes, in pre-order */
  get errorSpans(): readonly Span[] {
    return this.errors;
  }

  /**
   * The error that reaches furthest into the source, or null for a clean tree
   */
  furthestError(): Span | null {
    let furthest: Span | null = null;
    for (const span of this.errors) {
      if (!furthest || span.end > furthest.end || (span.end === furthest.end && span.start < furthest.start)) {
        furthest = span;
      }
    }
    return furthest;
  }

  node(id: NodeId): SyntaxNode {
    this.record(id);
    return new NodeView(this, id);
  }

  kindOf(id: NodeId): string {
    return this.record(id).kind;
  }

  isNamed(id: NodeId): boolean {
    return this.record(id).named;
  }

  fieldOf(id: NodeId): string | null {
    return this.record(id).field;
  }

  parentOf(id: NodeId): NodeId | null {
    const parent = this.record(id).parent;
    return parent === NO_PARENT ? null : parent;
  }

  childIds(id: NodeId): readonly NodeId[] {
    return this.record(id).children;
  }

  spanOf(id: NodeId): Span {
    const r = this.record(id);
    return { start: r.start, end: r.end };
  }

  textOf(id: NodeId): string {
    const r = this.record(id);
    return this.source.slice(r.start, r.end);
  }

  /**
   * Depth-first pre-order walk, root first. Uses an explicit stack so deep
   * trees cannot overflow the call stack.
   */
  *preorder(from: NodeId = 0): Generator<NodeId> {
    const stack: NodeId[] = [from];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      yield id;
      const children = this.record(id).children;
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
  }

  /** @internal */
  record(id: NodeId): NodeRecord {
    const r = this.records[id];
    if (!r) {
      throw new RangeError(`Node ${id} does not exist in this ${this.language} tree`);
    }
    return r;
  }
}

class NodeView implements SyntaxNode {
  readonly tree: SyntaxTree;
  readonly id: NodeId;

  constructor(tree: SyntaxTree, id: NodeId) {
    this.tree = tree;
    this.id = id;
  }

  get kind(): string {
    return this.tree.record(this.id).kind;
  }

  get named(): boolean {
    return this.tree.record(this.id).named;
  }

  get field(): string | null {
    return this.tree.record(this.id).field;
  }

  get start(): number {
    return this.tree.record(this.id).start;
  }

  get end(): number {
    return this.tree.record(this.id).end;
  }

  get startPoint(): Point {
    return { ...this.tree.record(this.id).startPoint };
  }

  get endPoint(): Point {
    return { ...this.tree.record(this.id).endPoint };
  }

  get isError(): boolean {
    return this.tree.record(this.id).isError;
  }

  get isMissing(): boolean {
    return this.tree.record(this.id).isMissing;
  }

  get text(): string {
    return this.tree.textOf(this.id);
  }

  get parent(): SyntaxNode | null {
    const parent = this.tree.parentOf(this.id);
    return parent === null ? null : this.tree.node(parent);
  }

  get childCount(): number {
    return this.tree.childIds(this.id).length;
  }

  get children(): SyntaxNode[] {
    return this.tree.childIds(this.id).map((c) => this.tree.node(c));
  }

  get namedChildren(): SyntaxNode[] {
    return this.tree
      .childIds(this.id)
      .filter((c) => this.tree.isNamed(c))
      .map((c) => this.tree.node(c));
  }

  child(index: number): SyntaxNode | null {
    const id = this.tree.childIds(this.id)[index];
    return id === undefined ? null : this.tree.node(id);
  }

  childForFieldName(field: string): SyntaxNode | null {
    const id = this.tree.childIds(this.id).find((c) => this.tree.fieldOf(c) === field);
    return id === undefined ? null : this.tree.node(id);
  }
}

export interface OpenNodeOptions {
  named?: boolean;
  field?: string | null;
  start: number;
  startPoint?: Point;
  isError?: boolean;
  isMissing?: boolean;
}

/**
 * Builds a SyntaxTree in pre-order: `open` a node, add its children, then
 * `close` it. Points are derived from offsets when not supplied.
 */
export class SyntaxTreeBuilder {
  private readonly language: string;
  private readonly source: string;
  private readonly records: NodeRecord[] = [];
  private readonly stack: NodeId[] = [];
  private lineStarts: number[] | null = null;

  constructor(language: string, source: string) {
    this.language = language;
    this.source = source;
  }

  open(kind: string, options: OpenNodeOptions): NodeId {
    const parent = this.stack.length > 0 ? this.stack[this.stack.length - 1] : NO_PARENT;
    if (parent === NO_PARENT && this.records.length > 0) {
      throw new Error(`Tree already has a root; cannot open '${kind}'`);
    }
    if (options.start < 0 || options.start > this.source.length) {
      throw new RangeError(`Start offset ${options.start} of '${kind}' is outside the source`);
    }
    const id = this.records.length;
    this.records.push({
      kind,
      named: options.named ?? true,
      field: options.field ?? null,
      parent,
      children: [],
      start: options.start,
      end: options.start,
      startPoint: options.startPoint ?? this.pointAt(options.start),
      endPoint: options.startPoint ?? this.pointAt(options.start),
      isError: options.isError ?? kind === "ERROR",
      isMissing: options.isMissing ?? false,
    });
    if (parent !== NO_PARENT) {
      this.records[parent].children.push(id);
    }
    this.stack.push(id);
    return id;
  }

  close(end: number, endPoint?: Point): NodeId {
    const id = this.stack.pop();
    if (id === undefined) {
      throw new Error("close() called with no open node");
    }
    const record = this.records[id];
    if (end < record.start || end > this.source.length) {
      throw new RangeError(`End offset ${end} of '${record.kind}' is outside [${record.start}, ${this.source.length}]`);
    }
    record.end = end;
    record.endPoint = endPoint ?? this.pointAt(end);
    return id;
  }

  /** Open and immediately close a childless node */
  leaf(kind: string, options: OpenNodeOptions & { end: number; endPoint?: Point }): NodeId {
    this.open(kind, options);
    return this.close(options.end, options.endPoint);
  }

  build(): SyntaxTree {
    if (this.stack.length > 0) {
      throw new Error(`${this.stack.length} node(s) left open`);
    }
    return new SyntaxTree(this.language, this.source, this.records);
  }

  private pointAt(offset: number): Point {
    if (!this.lineStarts) {
      this.lineStarts = [0];
      for (let i = 0; i < this.source.length; i++) {
        if (this.source[i] === "\n") this.lineStarts.push(i + 1);
      }
    }
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { row: lo, column: offset - this.lineStarts[lo] };
  }
}
