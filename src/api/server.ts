import Fastify, { type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import { logger } from '../utils/logger.js';
import type { VerificationPipeline } from '../services/pipeline/VerificationPipeline.js';
import { registerRoutes } from './routes.js';

export interface ServerOptions {
  maxUploadSizeMB: number;
  environment: string;
}

export async function buildServer(pipeline: VerificationPipeline, options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });

  await fastify.register(multipart, {
    limits: {
      fileSize: options.maxUploadSizeMB * 1024 * 1024,
      files: 1,
    },
  });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.debug({ method: request.method, url: request.url, statusCode: reply.statusCode }, 'Request completed');
  });

  await registerRoutes(fastify, pipeline, options.environment);

  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    logger.error({ error: error.message, code: error.code, url: request.url }, 'Request error');
    reply.code(statusCode).send({
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : error.code ?? 'BAD_REQUEST',
      message: error.message,
    });
  });

  return fastify;
}
