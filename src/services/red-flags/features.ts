// Feature Derivation
// Turn a presentation map into the flat feature set rules are matched against

import type { Presentation, PresentationEntry, PresentationValue } from './types.js';

interface DerivedThreshold {
  key: string;
  feature: string;
  test: (value: number) => boolean;
}

// Closed set of vital-sign cut points. Values are not range-checked.
export const DERIVED_THRESHOLDS: readonly DerivedThreshold[] = [
  { key: 'age', feature: 'age_below_2', test: (v) => v < 2 },
  { key: 'spo2', feature: 'spo2_below_90', test: (v) => v < 90 },
  { key: 'respiratory_rate', feature: 'respiratory_rate_above_30', test: (v) => v > 30 },
  { key: 'heart_rate', feature: 'tachycardia_above_120', test: (v) => v > 120 },
];

export function normalizeTextValue(value: string): string {
  return value.toLowerCase().replace(/ /g, '_');
}

function isMap(presentation: Presentation): presentation is ReadonlyMap<string, PresentationValue> {
  return presentation instanceof Map;
}

export function tagPresentation(presentation: Presentation): PresentationEntry[] {
  const pairs: Array<[string, PresentationValue]> = isMap(presentation)
    ? [...presentation.entries()]
    : Object.entries(presentation);

  return pairs.map(([key, value]): PresentationEntry => {
    switch (typeof value) {
      case 'boolean':
        return { kind: 'flag', key, value };
      case 'string':
        return { kind: 'text', key, value };
      default:
        return { kind: 'number', key, value };
    }
  });
}

function featuresFor(entry: PresentationEntry): string[] {
  switch (entry.kind) {
    case 'flag':
      return entry.value ? [entry.key] : [];
    case 'text':
      return [entry.key, normalizeTextValue(entry.value)];
    case 'number': {
      const derived = DERIVED_THRESHOLDS
        .filter(t => t.key === entry.key && t.test(entry.value))
        .map(t => t.feature);
      return [entry.key, ...derived];
    }
  }
}

export function deriveFeatures(presentation: Presentation): Set<string> {
  const features = new Set<string>();
  for (const entry of tagPresentation(presentation)) {
    for (const feature of featuresFor(entry)) {
      features.add(feature);
    }
  }
  return features;
}
