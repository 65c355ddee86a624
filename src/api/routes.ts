import type { FastifyInstance } from 'fastify';
import { createVerifyHandler, type VerifyQuery } from './handlers/verify.handler.js';
import { createDocumentTypesHandler } from './handlers/document-types.handler.js';
import { createHealthHandler } from './handlers/health.handler.js';
import { documentTypesResponseSchema, verificationRecordSchema, verifyQuerySchema } from './schemas/verify.schema.js';
import { errorResponseSchema, healthResponseSchema } from './schemas/common.schema.js';
import type { VerificationPipeline } from '../services/pipeline/VerificationPipeline.js';

export async function registerRoutes(fastify: FastifyInstance, pipeline: VerificationPipeline, environment: string) {
  fastify.post<{ Querystring: VerifyQuery }>('/verify', {
    schema: {
      querystring: verifyQuerySchema,
      response: {
        200: verificationRecordSchema,
        400: errorResponseSchema,
        422: verificationRecordSchema,
        500: errorResponseSchema,
      },
    },
    handler: createVerifyHandler(pipeline),
  });

  fastify.get('/document-types', {
    schema: {
      response: {
        200: documentTypesResponseSchema,
      },
    },
    handler: createDocumentTypesHandler(),
  });

  fastify.get('/health', {
    schema: {
      response: {
        200: healthResponseSchema,
      },
    },
    handler: createHealthHandler(pipeline, environment),
  });
}
