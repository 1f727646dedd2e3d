// Differential Diagnosis Types
// Value objects shared by the prior adjuster, calculator and routes

export type SymptomKey = string;
export type DiseaseId = string;

export type Gender = 'M' | 'F' | 'O';
export type Season = 'monsoon' | 'summer' | 'winter';
export type Location = 'urban' | 'rural';
export type Severity = 'mild' | 'moderate' | 'severe' | 'critical';

export interface PatientContext {
  age?: number;        // Years, may be fractional
  gender?: Gender;
  season?: Season;
  location?: Location;
}

export interface DiseaseProfile {
  severity?: Severity;
  icd10?: string;
  tests?: readonly string[];
}

export interface DistinguishingFeature {
  feature: string;
  meaningForFirst: string;
  meaningForSecond: string;
}

export interface DistinguishingPair {
  pair: readonly [DiseaseId, DiseaseId];
  features: readonly DistinguishingFeature[];
}

/**
 * Immutable knowledge tables backing one calculator instance.
 * Priors and LR+ values are static domain constants, never learned.
 */
export interface KnowledgeBase {
  priors: ReadonlyMap<DiseaseId, number>;
  likelihoodRatios: ReadonlyMap<SymptomKey, ReadonlyMap<DiseaseId, number>>;
  profiles: ReadonlyMap<DiseaseId, DiseaseProfile>;
  distinguishing: readonly DistinguishingPair[];
}

export interface Differential {
  diagnosis: DiseaseId;
  probability: number;
  supportingFeatures: SymptomKey[];
  againstFeatures: SymptomKey[];
  suggestedTests: string[];
  severity: Severity;
  icd10Code?: string;
}

export interface CalculatorOptions {
  maxResults?: number;            // Default 10
  significanceThreshold?: number; // Default 0.01
}
