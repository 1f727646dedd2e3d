// Prior Adjuster
// Scale base-rate priors by demographic, seasonal and geographic factors

import type { DiseaseId, PatientContext } from './types.js';

export const MIN_PRIOR = 0.0001;
export const MAX_PRIOR = 0.99;

export interface PriorAdjustment {
  label: string;
  applies: (context: PatientContext) => boolean;
  factors: Readonly<Record<DiseaseId, number>>;
}

// Evaluated independently; every matching row compounds multiplicatively
export const PRIOR_ADJUSTMENTS: readonly PriorAdjustment[] = [
  {
    label: 'pediatric',
    applies: (c) => c.age !== undefined && c.age < 18,
    factors: {
      viral_fever: 2.0,
      upper_respiratory_tract_infection: 1.5,
      acute_coronary_syndrome: 0.01,
      type_2_diabetes: 0.1,
    },
  },
  {
    label: 'geriatric',
    applies: (c) => c.age !== undefined && c.age > 60,
    factors: {
      acute_coronary_syndrome: 3.0,
      stroke: 4.0,
      type_2_diabetes: 1.5,
      hypertension: 1.8,
    },
  },
  {
    label: 'monsoon',
    applies: (c) => c.season === 'monsoon',
    factors: {
      dengue: 5.0,
      malaria: 4.0,
      leptospirosis: 10.0,
      chikungunya: 5.0,
    },
  },
  {
    label: 'summer',
    applies: (c) => c.season === 'summer',
    factors: {
      dengue: 2.0,
      typhoid: 2.0,
    },
  },
  {
    label: 'rural',
    applies: (c) => c.location === 'rural',
    factors: {
      malaria: 2.0,
      tuberculosis: 1.5,
      leptospirosis: 3.0,
    },
  },
  {
    label: 'female',
    applies: (c) => c.gender === 'F',
    factors: {
      urinary_tract_infection: 3.0,
      hypothyroidism: 2.0,
      anemia: 1.5,
    },
  },
];

export function clampPrior(p: number): number {
  return Math.max(MIN_PRIOR, Math.min(MAX_PRIOR, p));
}

/**
 * Returns a fresh prior table with context multipliers applied and every
 * value clamped to [MIN_PRIOR, MAX_PRIOR]. The input table is left untouched.
 * Factors naming a disease absent from the table are ignored. The clamp also
 * runs with no context, so a sub-floor prior is raised to MIN_PRIOR.
 */
export function adjustPriors(
  priors: ReadonlyMap<DiseaseId, number>,
  context?: PatientContext | null,
  adjustments: readonly PriorAdjustment[] = PRIOR_ADJUSTMENTS,
): Map<DiseaseId, number> {
  const adjusted = new Map(priors);

  if (context) {
    for (const adjustment of adjustments) {
      if (!adjustment.applies(context)) continue;
      for (const [disease, factor] of Object.entries(adjustment.factors)) {
        const current = adjusted.get(disease);
        if (current !== undefined) {
          adjusted.set(disease, current * factor);
        }
      }
    }
  }

  for (const [disease, p] of adjusted) {
    adjusted.set(disease, clampPrior(p));
  }

  return adjusted;
}
