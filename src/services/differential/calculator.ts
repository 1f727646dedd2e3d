// Differential Calculator
// Combines adjusted priors with observed-symptom LR+ values in log-odds space

import { getBundledKnowledgeBase } from './knowledge-base.js';
import { adjustPriors } from './priors.js';
import type {
  CalculatorOptions,
  Differential,
  DiseaseId,
  DistinguishingFeature,
  KnowledgeBase,
  PatientContext,
  SymptomKey,
} from './types.js';

const DEFAULT_MAX_RESULTS = 10;
const DEFAULT_SIGNIFICANCE_THRESHOLD = 0.01;

// Findings shifting odds by more than this are recorded as evidence on update
const SUPPORTING_LR = 1.5;
const AGAINST_LR = 0.67;

// Fallback tests keyed by a substring of the diagnosis id
const CATEGORY_TESTS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['infectious', ['CBC', 'CRP', 'ESR']],
  ['cardiac', ['ECG', 'Troponin', '2D Echo']],
  ['respiratory', ['Chest X-ray', 'SpO2']],
  ['metabolic', ['FBS', 'HbA1c', 'Lipid profile']],
];

const DEFAULT_TESTS: readonly string[] = ['CBC', 'CRP'];

function logistic(logOdds: number): number {
  return 1 / (1 + Math.exp(-logOdds));
}

function byProbabilityDesc(a: Differential, b: Differential): number {
  return b.probability - a.probability;
}

export class DifferentialCalculator {
  private readonly maxResults: number;
  private readonly significanceThreshold: number;

  constructor(
    private readonly knowledge: KnowledgeBase = getBundledKnowledgeBase(),
    options: CalculatorOptions = {},
  ) {
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.significanceThreshold = options.significanceThreshold ?? DEFAULT_SIGNIFICANCE_THRESHOLD;
  }

  /**
   * Rank diagnoses for a set of observed symptoms.
   *
   * Every disease in the prior table is scored, even with no symptoms, so a
   * condition whose prior alone clears the significance threshold is always
   * returned. Probabilities are normalized over the returned set only.
   */
  calculate(symptoms: Iterable<SymptomKey>, context?: PatientContext | null): Differential[] {
    const observed = [...new Set(symptoms)];
    const priors = adjustPriors(this.knowledge.priors, context);

    const significant: Differential[] = [];
    for (const [diagnosis, prior] of priors) {
      let logOdds = Math.log(prior / (1 - prior));
      const supporting: SymptomKey[] = [];

      for (const symptom of observed) {
        const lr = this.lookupLikelihoodRatio(symptom, diagnosis);
        if (lr === undefined) continue;
        logOdds += Math.log(lr);
        supporting.push(symptom);
      }

      const probability = logistic(logOdds);
      if (probability >= this.significanceThreshold) {
        significant.push(this.buildDifferential(diagnosis, probability, supporting));
      }
    }

    // Rank on raw posteriors, then normalize over exactly what is returned
    const ranked = significant.sort(byProbabilityDesc).slice(0, this.maxResults);
    const total = ranked.reduce((sum, d) => sum + d.probability, 0);
    if (ranked.length === 0 || total <= 0) {
      return [];
    }

    for (const differential of ranked) {
      differential.probability /= total;
    }

    return ranked;
  }

  /**
   * Sequentially fold one more finding into an existing differential list.
   *
   * Absent findings use 1/LR+ as an approximate LR-. Only diagnoses already in
   * `current` are rescored and renormalized; the input list is not mutated.
   */
  update(current: readonly Differential[], finding: SymptomKey, present: boolean): Differential[] {
    const copies = current.map(d => ({
      ...d,
      supportingFeatures: [...d.supportingFeatures],
      againstFeatures: [...d.againstFeatures],
      suggestedTests: [...d.suggestedTests],
    }));

    const informative = copies.some(d => this.lookupLikelihoodRatio(finding, d.diagnosis) !== undefined);
    if (!informative) {
      return copies;
    }

    for (const differential of copies) {
      const entry = this.lookupLikelihoodRatio(finding, differential.diagnosis);
      if (entry === undefined) continue;

      // An LR+ of 0 gives an infinite log-odds when absent, which maps to 1
      const lr = present ? entry : 1 / entry;
      const p = differential.probability;
      const logOdds = Math.log(p) - Math.log(1 - p + 1e-10) + Math.log(lr);
      if (!Number.isNaN(logOdds)) {
        differential.probability = logistic(logOdds);
      }

      if (present && lr > SUPPORTING_LR) {
        differential.supportingFeatures.push(finding);
      } else if (!present && lr < AGAINST_LR) {
        differential.againstFeatures.push(finding);
      }
    }

    const total = copies.reduce((sum, d) => sum + d.probability, 0);
    if (total > 0) {
      for (const differential of copies) {
        differential.probability /= total;
      }
    }

    return copies.sort(byProbabilityDesc);
  }

  /**
   * Features that separate two diagnoses, from a hand-authored table.
   * Order of the arguments decides which meaning column is which.
   */
  distinguish(first: DiseaseId, second: DiseaseId): DistinguishingFeature[] {
    for (const { pair, features } of this.knowledge.distinguishing) {
      if (pair[0] === first && pair[1] === second) {
        return features.map(f => ({ ...f }));
      }
    }

    for (const { pair, features } of this.knowledge.distinguishing) {
      if (pair[0] === second && pair[1] === first) {
        return features.map(f => ({
          feature: f.feature,
          meaningForFirst: f.meaningForSecond,
          meaningForSecond: f.meaningForFirst,
        }));
      }
    }

    return [];
  }

  suggestedTests(diagnosis: DiseaseId): string[] {
    const profileTests = this.knowledge.profiles.get(diagnosis)?.tests;
    if (profileTests) {
      return [...profileTests];
    }

    const id = diagnosis.toLowerCase();
    for (const [category, tests] of CATEGORY_TESTS) {
      if (id.includes(category)) {
        return [...tests];
      }
    }

    return [...DEFAULT_TESTS];
  }

  private lookupLikelihoodRatio(symptom: SymptomKey, diagnosis: DiseaseId): number | undefined {
    return this.knowledge.likelihoodRatios.get(symptom)?.get(diagnosis);
  }

  private buildDifferential(diagnosis: DiseaseId, probability: number, supporting: SymptomKey[]): Differential {
    const profile = this.knowledge.profiles.get(diagnosis);
    return {
      diagnosis,
      probability,
      supportingFeatures: supporting,
      againstFeatures: [],
      suggestedTests: this.suggestedTests(diagnosis),
      severity: profile?.severity ?? 'moderate',
      ...(profile?.icd10 ? { icd10Code: profile.icd10 } : {}),
    };
  }
}
