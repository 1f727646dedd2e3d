// Red Flag Types
// Declarative rules, tagged presentation entries and matcher output

export type Urgency = 'EMERGENCY' | 'URGENT' | 'WARNING';

// Lower sorts first
export const URGENCY_ORDER: Readonly<Record<Urgency, number>> = {
  EMERGENCY: 0,
  URGENT: 1,
  WARNING: 2,
};

export type PresentationValue = boolean | string | number;

export type Presentation =
  | Readonly<Record<string, PresentationValue>>
  | ReadonlyMap<string, PresentationValue>;

export type PresentationEntry =
  | { kind: 'flag'; key: string; value: boolean }
  | { kind: 'text'; key: string; value: string }
  | { kind: 'number'; key: string; value: number };

export interface RedFlagRule {
  name: string;
  category: string;
  required: readonly string[];   // All must be present
  anyOf: readonly string[];      // At least `threshold` must be present
  threshold: number;             // 0 = anyOf is advisory only
  urgency: Urgency;
  description: string;
  action: string;
  timeCritical: string;
  concerns: readonly string[];
}

export interface RedFlag {
  rule: string;
  category: string;
  description: string;
  urgency: Urgency;
  recommendedAction: string;
  timeCritical: string;
  matchingFeatures: string[];
  differentialConcerns: string[];
}

export type TriageLevel =
  | 'Emergency (Red)'
  | 'Urgent (Orange)'
  | 'Semi-urgent (Yellow)'
  | 'Standard';
