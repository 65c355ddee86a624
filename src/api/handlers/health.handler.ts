import type { FastifyReply, FastifyRequest } from 'fastify';
import type { VerificationPipeline } from '../../services/pipeline/VerificationPipeline.js';

export function createHealthHandler(pipeline: VerificationPipeline, environment: string) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const services = await pipeline.testConnections();

    return reply.code(200).send({
      status: services.extraction && services.reasoning ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment,
      services,
    });
  };
}
