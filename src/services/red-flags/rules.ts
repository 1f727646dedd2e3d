// Red Flag Rule Set
// Ordered rule table; authoring order breaks ties between equal urgencies

import { readFileSync } from 'fs';
import { z } from 'zod';
import { AppError } from '../../utils/errors.js';
import type { RedFlagRule } from './types.js';

const RedFlagRuleSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  required: z.array(z.string().min(1)).default([]),
  anyOf: z.array(z.string().min(1)).default([]),
  threshold: z.number().int().nonnegative().default(1),
  urgency: z.enum(['EMERGENCY', 'URGENT', 'WARNING']),
  description: z.string().min(1),
  action: z.string().min(1),
  timeCritical: z.string().default(''),
  concerns: z.array(z.string()).default([]),
});

const RuleSetSchema = z.array(RedFlagRuleSchema).superRefine((rules, ctx) => {
  const seen = new Set<string>();
  rules.forEach((rule, index) => {
    if (seen.has(rule.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate rule name "${rule.name}"`,
        path: [index, 'name'],
      });
    }
    seen.add(rule.name);
  });
});

/**
 * Validate and freeze a rule table. The returned array keeps input order.
 * Throws AppError(KNOWLEDGE_BASE_INVALID) on malformed input.
 */
export function loadRuleSet(raw: unknown): readonly RedFlagRule[] {
  const parsed = RuleSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.knowledgeBaseInvalid('red-flag-rules', parsed.error.issues);
  }

  return Object.freeze(parsed.data.map(rule => Object.freeze({
    ...rule,
    required: Object.freeze([...rule.required]),
    anyOf: Object.freeze([...rule.anyOf]),
    concerns: Object.freeze([...rule.concerns]),
  })));
}

let bundled: readonly RedFlagRule[] | null = null;

export function getBundledRuleSet(): readonly RedFlagRule[] {
  if (!bundled) {
    const raw = readFileSync(new URL('./data/rules.json', import.meta.url), 'utf8');
    bundled = loadRuleSet(JSON.parse(raw));
  }
  return bundled;
}
