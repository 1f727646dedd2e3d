import { describe, it, expect } from 'vitest';
import { DifferentialCalculator } from '../calculator.js';
import { loadKnowledgeBase } from '../knowledge-base.js';
import type { Differential, PatientContext } from '../types.js';

const FEVER_SYMPTOMS = ['fever_with_body_ache', 'fever_with_headache', 'fever_with_rash'];
const MONSOON_ADULT: PatientContext = { age: 28, gender: 'M', season: 'monsoon', location: 'urban' };

function sumOf(differentials: Differential[]): number {
  return differentials.reduce((sum, d) => sum + d.probability, 0);
}

function dx(diagnosis: string, probability: number): Differential {
  return {
    diagnosis,
    probability,
    supportingFeatures: [],
    againstFeatures: [],
    suggestedTests: [],
    severity: 'moderate',
  };
}

describe('DifferentialCalculator', () => {
  const calculator = new DifferentialCalculator();

  describe('calculate', () => {
    it('should rank dengue first for a monsoon fever with rash, headache and body ache', () => {
      const result = calculator.calculate(FEVER_SYMPTOMS, MONSOON_ADULT);

      expect(result.map(d => d.diagnosis)).toEqual([
        'dengue',
        'vitamin_d_deficiency',
        'anemia',
        'chikungunya',
        'hypertension',
        'dyslipidemia',
        'viral_fever',
        'hypothyroidism',
        'benign_prostatic_hyperplasia',
        'type_2_diabetes',
      ]);
      expect(result[0].supportingFeatures).toEqual(FEVER_SYMPTOMS);
    });

    it('should rank dengue above malaria when the list is not truncated', () => {
      const wide = new DifferentialCalculator(undefined, { maxResults: 100 });
      const names = wide.calculate(FEVER_SYMPTOMS, MONSOON_ADULT).map(d => d.diagnosis);

      const dengue = names.indexOf('dengue');
      const malaria = names.indexOf('malaria');
      expect(dengue).toBe(0);
      expect(malaria).toBeGreaterThan(dengue);
      // Monsoon-boosted but its posterior stays under 1%
      expect(names).not.toContain('leptospirosis');
    });

    it('should return at most 10 differentials in non-increasing order summing to 1', () => {
      const cases: Array<[string[], PatientContext | null]> = [
        [[], null],
        [FEVER_SYMPTOMS, MONSOON_ADULT],
        [['chest_pain_crushing', 'chest_pain_with_sweating', 'breathlessness'], { age: 67 }],
        [['dysuria', 'urinary_frequency'], { gender: 'F' }],
        [['stridor', 'drooling', 'barking_cough'], { age: 3, location: 'rural' }],
      ];

      for (const [symptoms, context] of cases) {
        const result = calculator.calculate(symptoms, context);
        expect(result.length).toBeGreaterThan(0);
        expect(result.length).toBeLessThanOrEqual(10);
        expect(sumOf(result)).toBeCloseTo(1, 6);
        for (let i = 0; i < result.length; i++) {
          expect(result[i].probability).toBeGreaterThan(0);
          expect(result[i].probability).toBeLessThanOrEqual(1);
          if (i > 0) {
            expect(result[i].probability).toBeLessThanOrEqual(result[i - 1].probability);
          }
        }
      }
    });

    it('should return high-prior conditions with no symptoms at all', () => {
      const result = calculator.calculate([], null);

      expect(result.map(d => d.diagnosis)).toEqual([
        'vitamin_d_deficiency',
        'anemia',
        'hypertension',
        'dyslipidemia',
        'hypothyroidism',
        'benign_prostatic_hyperplasia',
        'type_2_diabetes',
        'gerd',
        'ischemic_heart_disease',
        'upper_respiratory_tract_infection',
      ]);
      expect(result.every(d => d.supportingFeatures.length === 0)).toBe(true);
      expect(result.map(d => d.diagnosis)).not.toContain('epiglottitis');
    });

    it('should return exactly the diseases whose prior clears 1% for an empty symptom set', () => {
      const small = new DifferentialCalculator(
        loadKnowledgeBase({
          priors: { common: 0.7, rare: 0.000025, mid: 0.05 },
          likelihoodRatios: {},
        }),
      );

      const result = small.calculate(new Set(), null);

      expect(result.map(d => d.diagnosis)).toEqual(['common', 'mid']);
      expect(result[0].probability).toBeCloseTo(0.7 / 0.75, 10);
      expect(result[1].probability).toBeCloseTo(0.05 / 0.75, 10);
    });

    it('should ignore unknown symptom keys', () => {
      expect(calculator.calculate(['not_a_real_symptom'])).toEqual(calculator.calculate([]));
    });

    it('should treat duplicate symptoms as one observation', () => {
      const once = calculator.calculate(['fever_with_rash']);
      const twice = calculator.calculate(['fever_with_rash', 'fever_with_rash']);
      expect(twice).toEqual(once);
    });

    it('should return an empty list when nothing clears the significance threshold', () => {
      const small = new DifferentialCalculator(
        loadKnowledgeBase({
          priors: { rare: 0.001, ruled_out: 0.5 },
          likelihoodRatios: { negative_test: { ruled_out: 0 } },
        }),
      );

      expect(small.calculate(['negative_test'])).toEqual([]);
    });

    it('should shift every returned probability when one more symptom is added', () => {
      const before = calculator.calculate([]);
      const after = calculator.calculate(['fever_with_rash']);

      const vitaminBefore = before.find(d => d.diagnosis === 'vitamin_d_deficiency');
      const vitaminAfter = after.find(d => d.diagnosis === 'vitamin_d_deficiency');

      expect(vitaminBefore?.supportingFeatures).toEqual([]);
      expect(vitaminAfter?.supportingFeatures).toEqual([]);
      expect(vitaminAfter?.probability).not.toBe(vitaminBefore?.probability);
      expect(after.map(d => d.diagnosis)).toContain('viral_fever');
    });

    it('should honour a custom result limit and significance threshold', () => {
      const narrow = new DifferentialCalculator(undefined, { maxResults: 3, significanceThreshold: 0.2 });
      const result = narrow.calculate([]);

      expect(result.map(d => d.diagnosis)).toEqual(['vitamin_d_deficiency', 'anemia', 'hypertension']);
      expect(sumOf(result)).toBeCloseTo(1, 10);
    });

    it('should attach severity, ICD-10 code and profile tests', () => {
      const [dengue] = calculator.calculate(FEVER_SYMPTOMS, MONSOON_ADULT);

      expect(dengue.diagnosis).toBe('dengue');
      expect(dengue.severity).toBe('severe');
      expect(dengue.icd10Code).toBe('A90');
      expect(dengue.suggestedTests).toEqual(['NS1 antigen', 'Dengue IgM/IgG', 'Platelet count', 'Hematocrit']);
      expect(dengue.againstFeatures).toEqual([]);
    });

    it('should return bit-identical results for repeated calls', () => {
      const first = calculator.calculate(FEVER_SYMPTOMS, MONSOON_ADULT);
      const second = calculator.calculate(FEVER_SYMPTOMS, MONSOON_ADULT);
      expect(second).toEqual(first);
    });
  });

  describe('suggestedTests', () => {
    it('should use the disease profile when one exists', () => {
      expect(calculator.suggestedTests('malaria')).toEqual(['Peripheral smear', 'Rapid malaria antigen', 'QBC']);
    });

    it('should fall back to a category match on the diagnosis id', () => {
      expect(calculator.suggestedTests('upper_respiratory_tract_infection')).toEqual(['Chest X-ray', 'SpO2']);
      expect(calculator.suggestedTests('cardiac_amyloidosis')).toEqual(['ECG', 'Troponin', '2D Echo']);
    });

    it('should fall back to the generic list otherwise', () => {
      expect(calculator.suggestedTests('hypertension')).toEqual(['CBC', 'CRP']);
    });
  });

  describe('update', () => {
    const small = new DifferentialCalculator(
      loadKnowledgeBase({
        priors: { a: 0.2, b: 0.1 },
        likelihoodRatios: {
          f: { a: 4 },
          g: { c: 3 },
          weak: { a: 1.2 },
          h: { a: 2, c: 50 },
          excluder: { a: 0 },
        },
      }),
    );

    it('should raise a diagnosis when a supporting finding is present', () => {
      const result = small.update([dx('a', 0.5), dx('b', 0.5)], 'f', true);

      expect(result.map(d => d.diagnosis)).toEqual(['a', 'b']);
      expect(result[0].probability).toBeCloseTo(0.8 / 1.3, 6);
      expect(result[1].probability).toBeCloseTo(0.5 / 1.3, 6);
      expect(result[0].supportingFeatures).toEqual(['f']);
      expect(result[1].supportingFeatures).toEqual([]);
    });

    it('should lower a diagnosis with 1/LR+ when the finding is absent', () => {
      const result = small.update([dx('a', 0.5), dx('b', 0.5)], 'f', false);

      expect(result.map(d => d.diagnosis)).toEqual(['b', 'a']);
      expect(result[0].probability).toBeCloseTo(0.5 / 0.7, 6);
      expect(result[1].probability).toBeCloseTo(0.2 / 0.7, 6);
      expect(result[1].againstFeatures).toEqual(['f']);
    });

    it('should keep probabilities finite for a zero likelihood ratio', () => {
      const absent = small.update([dx('a', 0.5), dx('b', 0.5)], 'excluder', false);

      expect(absent.every(d => Number.isFinite(d.probability))).toBe(true);
      expect(absent.map(d => d.diagnosis)).toEqual(['a', 'b']);
      expect(absent[0].probability).toBeCloseTo(2 / 3, 6);
      expect(absent[1].probability).toBeCloseTo(1 / 3, 6);

      const present = small.update([dx('a', 0.5), dx('b', 0.5)], 'excluder', true);

      expect(present.map(d => d.diagnosis)).toEqual(['b', 'a']);
      expect(present[0].probability).toBe(1);
      expect(present[1].probability).toBe(0);
    });

    it('should not record weak evidence as supporting', () => {
      const [a] = small.update([dx('a', 0.5), dx('b', 0.5)], 'weak', true);
      expect(a.diagnosis).toBe('a');
      expect(a.supportingFeatures).toEqual([]);
    });

    it('should leave the list unchanged for an unknown finding', () => {
      const current = [dx('a', 0.6), dx('b', 0.4)];
      const result = small.update(current, 'unknown', true);

      expect(result).toEqual(current);
      expect(result).not.toBe(current);
    });

    it('should leave probabilities and order unchanged when no listed diagnosis has an entry', () => {
      const current = [dx('b', 0.3), dx('a', 0.7)];
      expect(small.update(current, 'g', true)).toEqual(current);
    });

    it('should never introduce a diagnosis absent from the current list', () => {
      const result = small.update([dx('a', 0.5), dx('b', 0.5)], 'h', true);

      expect(result.map(d => d.diagnosis).sort()).toEqual(['a', 'b']);
      expect(sumOf(result)).toBeCloseTo(1, 10);
    });

    it('should not mutate its input', () => {
      const current = [dx('a', 0.5), dx('b', 0.5)];
      small.update(current, 'f', true);

      expect(current[0].probability).toBe(0.5);
      expect(current[0].supportingFeatures).toEqual([]);
    });

    it('should compose with calculate', () => {
      const initial = calculator.calculate(['fever_with_headache'], MONSOON_ADULT);
      const updated = calculator.update(initial, 'fever_with_rash', true);

      expect(updated.map(d => d.diagnosis).sort()).toEqual(initial.map(d => d.diagnosis).sort());
      expect(sumOf(updated)).toBeCloseTo(1, 6);
    });
  });

  describe('distinguish', () => {
    it('should return features for a defined pair', () => {
      const features = calculator.distinguish('dengue', 'malaria');

      expect(features).toHaveLength(3);
      expect(features[0]).toEqual({
        feature: 'fever_pattern',
        meaningForFirst: 'Continuous high',
        meaningForSecond: 'Intermittent with chills',
      });
    });

    it('should swap meanings when only the reversed pair is defined', () => {
      const features = calculator.distinguish('gerd', 'acute_coronary_syndrome');

      expect(features.map(f => f.feature)).toEqual([
        'pain_character',
        'radiation',
        'relief_with_antacids',
        'exertion_related',
      ]);
      expect(features[0]).toEqual({
        feature: 'pain_character',
        meaningForFirst: 'Burning',
        meaningForSecond: 'Crushing, pressure',
      });
    });

    it('should return an empty list for an unknown pair', () => {
      expect(calculator.distinguish('dengue', 'unknown_disease')).toEqual([]);
    });
  });
});
