export { DifferentialCalculator } from './calculator.js';
export { getBundledKnowledgeBase, loadKnowledgeBase } from './knowledge-base.js';
export type { KnowledgeBaseSources } from './knowledge-base.js';
export { adjustPriors, clampPrior, PRIOR_ADJUSTMENTS, MIN_PRIOR, MAX_PRIOR } from './priors.js';
export type { PriorAdjustment } from './priors.js';
export type {
  CalculatorOptions,
  Differential,
  DiseaseId,
  DiseaseProfile,
  DistinguishingFeature,
  Gender,
  KnowledgeBase,
  Location,
  PatientContext,
  Season,
  Severity,
  SymptomKey,
} from './types.js';
