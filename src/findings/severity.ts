export type Severity = "critical" | "high" | "medium" | "low" | "info";

export const SEVERITY_ORDER: Record<Severity, number> = {
  info: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export const DEFAULT_SEVERITY: Severity = "medium";

export function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_ORDER, value);
}

/**
 * Sortable severity rank; unknown severities rank as info
 */
export function severityRank(severity: string): number {
  const normalized = severity.toLowerCase();
  return isSeverity(normalized) ? SEVERITY_ORDER[normalized] : 0;
}
