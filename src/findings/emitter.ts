/**
 * Finding emitter - accepted CaptureSet to Finding
 *
 * Pure: the same query and capture set always give an equal finding.
 */

import { firstCapture, type CaptureSet } from "../matcher/types.js";
import type { PatternProperty, Query } from "../query/types.js";
import type { SyntaxNode } from "../treesitter/types.js";
import { isSeverity, type Severity } from "./severity.js";
import type { Finding } from "./types.js";

interface Primary {
  name: string;
  node: SyntaxNode;
}

/**
 * The query's primary capture when this match bound it, else the pattern
 * root under its first capture name (or the category when uncaptured)
 */
function selectPrimary(query: Query, captureSet: CaptureSet, category: string): Primary {
  if (query.primaryCapture !== null) {
    const node = firstCapture(captureSet, query.primaryCapture);
    if (node) return { name: query.primaryCapture, node };
  }
  const root = captureSet.root;
  const rootCapture = captureSet.captures.find((c) => c.node.id === root.id);
  return { name: rootCapture?.name ?? category, node: root };
}

function property(properties: readonly PatternProperty[], key: string): string | undefined {
  return properties.find((p) => p.key === key && p.value !== null)?.value ?? undefined;
}

function interpolate(template: string, primary: Primary): string {
  return template.replace(/\{\{\s*(text|capture)\s*\}\}/g, (_, key: string) =>
    key === "text" ? primary.node.text : primary.name
  );
}

export function emit(query: Query, captureSet: CaptureSet, file: string): Finding {
  const properties = query.patterns.find((p) => p.index === captureSet.patternIndex)?.properties ?? [];

  const category = property(properties, "category") ?? query.category;
  const patternSeverity = property(properties, "severity");
  // The compiler defaults a query's severity to medium
  const severity: Severity =
    patternSeverity !== undefined && isSeverity(patternSeverity) ? patternSeverity : query.severity;

  const tags = new Set(query.tags);
  for (const p of properties) {
    if (p.key === "tag" && p.value !== null) tags.add(p.value);
  }

  const primary = selectPrimary(query, captureSet, category);
  const template = property(properties, "message") ?? query.message ?? `${category} matched`;
  const node = primary.node;

  const finding: Finding = {
    queryId: query.id,
    category,
    captureName: primary.name,
    span: Object.freeze({ file, start: node.start, end: node.end }),
    boundText: node.text,
    tags: Object.freeze([...tags].sort()),
    severity,
    message: interpolate(template, primary),
    startPoint: Object.freeze(node.startPoint),
    endPoint: Object.freeze(node.endPoint),
    language: node.tree.language,
    patternIndex: captureSet.patternIndex,
  };
  return Object.freeze(finding);
}
