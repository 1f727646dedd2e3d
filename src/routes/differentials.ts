// Differential diagnosis routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { env } from '../env.js';
import { DifferentialCalculator } from '../services/differential/index.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const PatientContextSchema = z.object({
  age: z.number().finite().optional(),
  gender: z.enum(['M', 'F', 'O']).optional(),
  season: z.enum(['monsoon', 'summer', 'winter']).optional(),
  location: z.enum(['urban', 'rural']).optional(),
});

const CalculateSchema = z.object({
  symptoms: z.array(z.string().min(1)).max(200),
  context: PatientContextSchema.nullish(),
});

const DifferentialSchema = z.object({
  diagnosis: z.string().min(1),
  probability: z.number().min(0).max(1),
  supportingFeatures: z.array(z.string()).default([]),
  againstFeatures: z.array(z.string()).default([]),
  suggestedTests: z.array(z.string()).default([]),
  severity: z.enum(['mild', 'moderate', 'severe', 'critical']).default('moderate'),
  icd10Code: z.string().optional(),
});

const UpdateSchema = z.object({
  differentials: z.array(DifferentialSchema).max(50),
  finding: z.string().min(1),
  present: z.boolean(),
});

const DistinguishQuerySchema = z.object({
  dx1: z.string().min(1),
  dx2: z.string().min(1),
});

function invalid(issues: z.ZodIssue[], message = 'Invalid request body') {
  return formatErrorResponse(AppError.validationError(message, issues), true);
}

export async function differentialRoutes(server: FastifyInstance) {
  const calculator = new DifferentialCalculator(undefined, {
    maxResults: env.MAX_DIFFERENTIALS,
    significanceThreshold: env.SIGNIFICANCE_THRESHOLD,
  });

  // POST /v1/differentials - Rank diagnoses for a symptom set
  server.post('/differentials', async (request, reply) => {
    const parsed = CalculateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(invalid(parsed.error.issues));
    }
    const { symptoms, context } = parsed.data;

    const differentials = calculator.calculate(symptoms, context);
    request.log.debug(
      { symptomCount: symptoms.length, resultCount: differentials.length },
      'differentials calculated',
    );

    return { differentials };
  });

  // POST /v1/differentials/update - Fold one finding into an existing list
  server.post('/differentials/update', async (request, reply) => {
    const parsed = UpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(invalid(parsed.error.issues));
    }
    const { differentials, finding, present } = parsed.data;

    return { differentials: calculator.update(differentials, finding, present) };
  });

  // GET /v1/differentials/distinguish?dx1=&dx2= - Features separating two diagnoses
  server.get('/differentials/distinguish', async (request, reply) => {
    const parsed = DistinguishQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send(invalid(parsed.error.issues, 'Invalid query'));
    }
    const { dx1, dx2 } = parsed.data;

    return { features: calculator.distinguish(dx1, dx2) };
  });
}
