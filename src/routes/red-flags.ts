// Red flag routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { assessPresentation, RedFlagMatcher } from '../services/red-flags/index.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const CheckSchema = z.object({
  presentation: z.record(z.string(), z.union([z.boolean(), z.string(), z.number().finite()])),
});

export async function redFlagRoutes(server: FastifyInstance) {
  const matcher = new RedFlagMatcher();

  // POST /v1/red-flags - Match a presentation against the rule table
  server.post('/red-flags', async (request, reply) => {
    const parsed = CheckSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(
        formatErrorResponse(AppError.validationError('Invalid request body', parsed.error.issues), true),
      );
    }

    const assessment = assessPresentation(parsed.data.presentation, matcher);
    request.log.debug(
      { flagCount: assessment.flags.length, triageLevel: assessment.triageLevel },
      'red flags checked',
    );

    return assessment;
  });
}
