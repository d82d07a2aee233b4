import type { Point } from "../treesitter/types.js";
import type { Severity } from "./severity.js";

export interface FindingSpan {
  readonly file: string;
  /** UTF-16 offsets into the source, end exclusive */
  readonly start: number;
  readonly end: number;
}

/**
 * A reported pattern occurrence. Each finding comes from exactly one
 * CaptureSet and is frozen when emitted.
 */
export interface Finding {
  readonly queryId: string;
  readonly category: string;
  readonly captureName: string;
  readonly span: FindingSpan;
  readonly boundText: string;
  /** Sorted, without duplicates */
  readonly tags: readonly string[];
  readonly severity: Severity;
  readonly message: string;
  /** Zero-based row and column */
  readonly startPoint: Point;
  readonly endPoint: Point;
  readonly language: string;
  readonly patternIndex: number;
}
