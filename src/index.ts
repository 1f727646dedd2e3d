// Clinical decision-support API
// Differential diagnosis and red-flag detection over HTTP

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env, logConfiguration } from './env.js';
import { differentialRoutes } from './routes/differentials.js';
import { redFlagRoutes } from './routes/red-flags.js';
import { AppError, formatErrorResponse } from './utils/errors.js';

const PORT = env.PORT;
const HOST = env.HOST;

const server = Fastify({
  logger: {
    level: env.LOG_LEVEL,
    ...(env.LOG_PRETTY
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  },
});

await server.register(cors, {
  origin: env.CORS_ORIGINS,
  credentials: true,
});

server.setErrorHandler((error, request, reply) => {
  if (error instanceof AppError) {
    request.log.error({ code: error.code }, error.message);
    return reply.code(error.statusCode).send(formatErrorResponse(error, env.NODE_ENV !== 'production'));
  }
  request.log.error(error);
  return reply.code(500).send(formatErrorResponse(AppError.internal()));
});

// Main health endpoint with /v1 prefix
server.get('/v1/health', async () => {
  return {
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: '1.0.0',
  };
});

// API routes
await server.register(differentialRoutes, { prefix: '/v1' });
await server.register(redFlagRoutes, { prefix: '/v1' });

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`Clinical decision-support API listening on http://${HOST}:${PORT}`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
