// Red Flag System Entry Point
// Derive features, match rules, then reduce to a triage level

import { RedFlagMatcher } from './matcher.js';
import { immediateAction, triageLevel } from './triage.js';
import type { Presentation, RedFlag, TriageLevel } from './types.js';

export interface RedFlagAssessment {
  flags: RedFlag[];
  triageLevel: TriageLevel;
  actions: string[];
}

export function assessPresentation(
  presentation: Presentation,
  matcher: RedFlagMatcher = new RedFlagMatcher(),
): RedFlagAssessment {
  const flags = matcher.check(presentation);

  return {
    flags,
    triageLevel: triageLevel(flags),
    actions: flags.map(immediateAction),
  };
}

export { RedFlagMatcher, ruleFires, observedFeatures } from './matcher.js';
export { deriveFeatures, tagPresentation, normalizeTextValue, DERIVED_THRESHOLDS } from './features.js';
export { loadRuleSet, getBundledRuleSet } from './rules.js';
export { triageLevel, immediateAction } from './triage.js';
export { URGENCY_ORDER } from './types.js';
export type {
  Presentation,
  PresentationEntry,
  PresentationValue,
  RedFlag,
  RedFlagRule,
  TriageLevel,
  Urgency,
} from './types.js';
