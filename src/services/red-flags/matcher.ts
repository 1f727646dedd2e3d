// Red Flag Matcher
// Evaluate declarative rules against a derived feature set

import { deriveFeatures } from './features.js';
import { getBundledRuleSet } from './rules.js';
import { URGENCY_ORDER } from './types.js';
import type { Presentation, RedFlag, RedFlagRule } from './types.js';

export function ruleFires(rule: RedFlagRule, features: ReadonlySet<string>): boolean {
  if (!rule.required.every(feature => features.has(feature))) {
    return false;
  }
  const anyOfMatches = rule.anyOf.filter(feature => features.has(feature)).length;
  return anyOfMatches >= rule.threshold;
}

// Only what was actually observed: present required features, then present anyOf features
export function observedFeatures(rule: RedFlagRule, features: ReadonlySet<string>): string[] {
  return [...rule.required, ...rule.anyOf].filter(feature => features.has(feature));
}

function toRedFlag(rule: RedFlagRule, features: ReadonlySet<string>): RedFlag {
  return {
    rule: rule.name,
    category: rule.category,
    description: rule.description,
    urgency: rule.urgency,
    recommendedAction: rule.action,
    timeCritical: rule.timeCritical,
    matchingFeatures: observedFeatures(rule, features),
    differentialConcerns: [...rule.concerns],
  };
}

export class RedFlagMatcher {
  constructor(private readonly rules: readonly RedFlagRule[] = getBundledRuleSet()) {}

  check(presentation: Presentation): RedFlag[] {
    return this.evaluate(deriveFeatures(presentation));
  }

  /**
   * Fired rules sorted EMERGENCY, URGENT, WARNING. Sort is stable, so equal
   * urgencies keep rule-table order.
   */
  evaluate(features: ReadonlySet<string>): RedFlag[] {
    return this.rules
      .filter(rule => ruleFires(rule, features))
      .map(rule => toRedFlag(rule, features))
      .sort((a, b) => URGENCY_ORDER[a.urgency] - URGENCY_ORDER[b.urgency]);
  }
}
