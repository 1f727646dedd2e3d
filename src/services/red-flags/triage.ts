// Triage Classifier
// Reduce fired red flags to a single triage level and format action text

import type { RedFlag, TriageLevel, Urgency } from './types.js';

const URGENCY_BANNERS: Readonly<Record<Urgency, string>> = {
  EMERGENCY: '🚨 EMERGENCY - ACT IMMEDIATELY:',
  URGENT: '⚠️ URGENT - Action needed within 1 hour:',
  WARNING: '⚡ WARNING - Evaluate within 4-6 hours:',
};

export function triageLevel(flags: readonly RedFlag[]): TriageLevel {
  if (flags.length === 0) return 'Standard';
  if (flags.some(f => f.urgency === 'EMERGENCY')) return 'Emergency (Red)';
  if (flags.some(f => f.urgency === 'URGENT')) return 'Urgent (Orange)';
  return 'Semi-urgent (Yellow)';
}

export function immediateAction(flag: RedFlag): string {
  const sections = [URGENCY_BANNERS[flag.urgency], flag.recommendedAction];

  if (flag.timeCritical) {
    sections.push(`⏱️ Time Critical: ${flag.timeCritical}`);
  }

  if (flag.differentialConcerns.length > 0) {
    sections.push(`🔍 Consider: ${flag.differentialConcerns.join(', ')}`);
  }

  return sections.join('\n\n');
}
