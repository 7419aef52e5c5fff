import type { FindingTier, Rule, Severity } from '../types.js';
import { ALL_SEVERITIES } from '../types.js';

/** Rank of each tier; lower ranks render first */
export const TIER_RANK: Readonly<Record<FindingTier, number>> = {
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
  'tooling-error': 4,
};

/** Fixed severity order, highest first */
export const SEVERITY_ORDER: readonly Severity[] = ALL_SEVERITIES;

/**
 * Severity Classifier: a finding takes its rule's declared severity.
 * There is no escalation beyond what the rule declares.
 */
export function classify(rule: Rule): Severity {
  return rule.severity;
}

/** Negative when `a` ranks above `b` */
export function compareTiers(a: FindingTier, b: FindingTier): number {
  return TIER_RANK[a] - TIER_RANK[b];
}

/** True when `tier` is a severity at or above `threshold`; tooling errors never are */
export function isAtLeast(tier: FindingTier, threshold: Severity): boolean {
  if (tier === 'tooling-error') return false;
  return TIER_RANK[tier] <= TIER_RANK[threshold];
}

export function isSeverity(value: string): value is Severity {
  return (SEVERITY_ORDER as readonly string[]).includes(value);
}
