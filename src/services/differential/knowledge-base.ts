// Knowledge base loader
// Validates the bundled JSON tables once and exposes them read-only

import { readFileSync } from 'fs';
import { z } from 'zod';
import { AppError } from '../../utils/errors.js';
import type { DiseaseProfile, DistinguishingPair, KnowledgeBase } from './types.js';

const PriorTableSchema = z.record(z.string(), z.number().gt(0).lt(1));

const LikelihoodTableSchema = z.record(
  z.string(),
  z.record(z.string(), z.number().nonnegative()),
);

const DiseaseProfileSchema = z.object({
  severity: z.enum(['mild', 'moderate', 'severe', 'critical']).optional(),
  icd10: z.string().min(1).optional(),
  tests: z.array(z.string().min(1)).optional(),
});

const ProfileTableSchema = z.record(z.string(), DiseaseProfileSchema);

const DistinguishingTableSchema = z.array(
  z.object({
    pair: z.tuple([z.string(), z.string()]),
    features: z.array(z.tuple([z.string(), z.string(), z.string()])),
  }),
);

export interface KnowledgeBaseSources {
  priors: unknown;
  likelihoodRatios: unknown;
  profiles?: unknown;
  distinguishing?: unknown;
}

function parseTable<T>(table: string, schema: z.ZodType<T>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.knowledgeBaseInvalid(table, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Build a knowledge base from raw (already JSON-decoded) tables.
 * Throws AppError(KNOWLEDGE_BASE_INVALID) when any table is malformed.
 */
export function loadKnowledgeBase(sources: KnowledgeBaseSources): KnowledgeBase {
  const priors = parseTable('priors', PriorTableSchema, sources.priors);
  const likelihoodRatios = parseTable('likelihood-ratios', LikelihoodTableSchema, sources.likelihoodRatios);
  const profiles = parseTable('disease-profiles', ProfileTableSchema, sources.profiles ?? {});
  const distinguishing = parseTable(
    'distinguishing-features',
    DistinguishingTableSchema,
    sources.distinguishing ?? [],
  );

  const lrTable = new Map<string, ReadonlyMap<string, number>>();
  for (const [symptom, entries] of Object.entries(likelihoodRatios)) {
    lrTable.set(symptom, new Map(Object.entries(entries)));
  }

  const profileTable = new Map<string, DiseaseProfile>();
  for (const [disease, profile] of Object.entries(profiles)) {
    profileTable.set(disease, Object.freeze({
      ...profile,
      tests: profile.tests ? Object.freeze([...profile.tests]) : undefined,
    }));
  }

  const pairs: DistinguishingPair[] = distinguishing.map(({ pair, features }) => Object.freeze({
    pair: Object.freeze([pair[0], pair[1]] as const),
    features: Object.freeze(features.map(([feature, meaningForFirst, meaningForSecond]) =>
      Object.freeze({ feature, meaningForFirst, meaningForSecond }),
    )),
  }));

  return Object.freeze({
    priors: new Map(Object.entries(priors)),
    likelihoodRatios: lrTable,
    profiles: profileTable,
    distinguishing: Object.freeze(pairs),
  });
}

function readDataFile(name: string): unknown {
  const raw = readFileSync(new URL(`./data/${name}`, import.meta.url), 'utf8');
  return JSON.parse(raw);
}

let bundled: KnowledgeBase | null = null;

// Lazily built once per process; later calls share the same frozen tables
export function getBundledKnowledgeBase(): KnowledgeBase {
  if (!bundled) {
    bundled = loadKnowledgeBase({
      priors: readDataFile('priors.json'),
      likelihoodRatios: readDataFile('likelihood-ratios.json'),
      profiles: readDataFile('disease-profiles.json'),
      distinguishing: readDataFile('distinguishing-features.json'),
    });
  }
  return bundled;
}
