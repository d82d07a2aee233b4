import { SEVERITY_ORDER, severityRank, type Severity } from "./severity.js";
import type { Finding } from "./types.js";

export interface FindingSummary {
  total: number;
  byCategory: Record<string, number>;
  bySeverity: Record<Severity, number>;
}

/**
 * Count findings by category and severity
 */
export function summarize(findings: readonly Finding[]): FindingSummary {
  const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  const byCategory: Record<string, number> = {};

  for (const finding of findings) {
    bySeverity[finding.severity]++;
    byCategory[finding.category] = (byCategory[finding.category] ?? 0) + 1;
  }

  return { total: findings.length, byCategory, bySeverity };
}

/**
 * Most severe first; ties keep file order, then offset order
 */
export function sortBySeverity(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(
    (a, b) =>
      severityRank(b.severity) - severityRank(a.severity) ||
      a.span.file.localeCompare(b.span.file) ||
      a.span.start - b.span.start
  );
}

export function atLeast(findings: readonly Finding[], threshold: Severity): Finding[] {
  return findings.filter((f) => SEVERITY_ORDER[f.severity] >= SEVERITY_ORDER[threshold]);
}
