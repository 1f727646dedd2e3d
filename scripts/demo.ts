#!/usr/bin/env node
/**
 * Walk through the differential calculator and red-flag matcher on sample cases
 */

import { DifferentialCalculator } from '../src/services/differential/index.js';
import { assessPresentation } from '../src/services/red-flags/index.js';
import type { Presentation } from '../src/services/red-flags/index.js';

const RULE = '='.repeat(80);

function title(diagnosis: string): string {
  return diagnosis
    .split('_')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function differentialDemo() {
  console.log(RULE);
  console.log('Differential diagnosis');
  console.log(RULE);

  const calculator = new DifferentialCalculator();
  const symptoms = ['fever_with_body_ache', 'fever_with_headache', 'fever_with_rash'];

  console.log('\nPatient: 28M, presenting during monsoon');
  console.log(`Symptoms: ${symptoms.join(', ')}\n`);

  const differentials = calculator.calculate(symptoms, {
    age: 28,
    gender: 'M',
    season: 'monsoon',
    location: 'urban',
  });

  differentials.forEach((d, i) => {
    console.log(`${i + 1}. ${title(d.diagnosis)}`);
    console.log(`   Probability: ${(d.probability * 100).toFixed(1)}%`);
    console.log(`   Supporting: ${d.supportingFeatures.join(', ') || '-'}`);
    console.log(`   Suggested tests: ${d.suggestedTests.join(', ')}`);
    console.log('');
  });

  const [first, second] = differentials;
  if (first && second) {
    const features = calculator.distinguish(first.diagnosis, second.diagnosis);
    if (features.length > 0) {
      console.log('Distinguishing features between top 2 diagnoses:');
      for (const f of features) {
        console.log(`  ${f.feature}:`);
        console.log(`    - ${first.diagnosis}: ${f.meaningForFirst}`);
        console.log(`    - ${second.diagnosis}: ${f.meaningForSecond}`);
      }
    }
  }
}

function redFlagCase(label: string, presentation: Presentation) {
  console.log(`\n${label}`);
  const { flags, triageLevel, actions } = assessPresentation(presentation);

  if (flags.length === 0) {
    console.log('No red flags detected');
    return;
  }

  console.log(`\n${flags.length} red flag(s) detected:\n`);
  flags.forEach((flag, i) => {
    console.log(`Category: ${flag.category}`);
    console.log(`Finding: ${flag.description}`);
    console.log(`Urgency: ${flag.urgency}`);
    console.log('\nImmediate action:');
    console.log(actions[i]);
    console.log('');
  });
  console.log(`Triage level: ${triageLevel}`);
}

function redFlagDemo() {
  console.log(`\n${RULE}`);
  console.log('Red flag detection');
  console.log(RULE);

  redFlagCase('Case 1: 55-year-old man with chest pain', {
    chest_pain: true,
    sweating: true,
    radiation_to_arm: true,
    age: 55,
  });

  console.log(`\n${'-'.repeat(80)}`);

  redFlagCase('Case 2: fever with neck stiffness', {
    fever: true,
    neck_stiffness: true,
    photophobia: true,
    severe_headache: true,
  });
}

differentialDemo();
redFlagDemo();
