import type { FastifyReply, FastifyRequest } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import { logger } from '../../utils/logger.js';
import { ContractViolationError, errorMessage } from '../../utils/errors.js';
import { createRequestId } from '../../utils/ids.js';
import { DOCUMENT_TYPES, parseDocumentType } from '../../domain/documents/DocumentType.js';
import { SUPPORTED_EXTENSIONS, mediaTypeFromFileName } from '../../services/extraction/media.js';
import { toWire } from '../../services/assessment/AssessmentAssembler.js';
import type { VerificationPipeline } from '../../services/pipeline/VerificationPipeline.js';

export interface VerifyQuery {
  document_type?: string;
}

const fieldValue = (fields: MultipartFile['fields'], name: string): string | undefined => {
  const entry = fields[name];
  const first = Array.isArray(entry) ? entry[0] : entry;
  if (first && first.type === 'field' && typeof first.value === 'string') {
    return first.value;
  }
  return undefined;
};

export function createVerifyHandler(pipeline: VerificationPipeline) {
  return async (request: FastifyRequest<{ Querystring: VerifyQuery }>, reply: FastifyReply) => {
    const data = await request.file();

    if (!data) {
      return reply.code(400).send({
        error: 'VALIDATION_ERROR',
        message: 'No file uploaded',
      });
    }

    // Multipart fields are only visible here when sent before the file part.
    const rawType = fieldValue(data.fields, 'document_type') ?? request.query.document_type;
    if (!rawType) {
      return reply.code(400).send({
        error: 'VALIDATION_ERROR',
        message: 'document_type is required',
      });
    }

    const documentType = parseDocumentType(rawType);
    if (!documentType) {
      return reply.code(400).send({
        error: 'UNKNOWN_DOCUMENT_TYPE',
        message: `Unknown document type "${rawType}". Expected one of: ${DOCUMENT_TYPES.join(', ')}`,
      });
    }

    const mediaType = mediaTypeFromFileName(data.filename);
    if (!mediaType) {
      return reply.code(400).send({
        error: 'UNSUPPORTED_MEDIA',
        message: `Unsupported file "${data.filename}". Supported extensions: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      });
    }

    const content = await data.toBuffer();
    const requestId = createRequestId('http');
    logger.info({ requestId, fileName: data.filename, size: content.length, documentType }, 'Received document');

    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableEnded) {
        controller.abort();
      }
    };
    reply.raw.once('close', onClose);

    try {
      const record = await pipeline.verify(
        { documentType, document: { content, mediaType, fileName: data.filename }, requestId },
        { signal: controller.signal }
      );
      return reply.code(record.status === 'failed' ? 422 : 200).send(toWire(record));
    } catch (error) {
      if (error instanceof ContractViolationError) {
        return reply.code(400).send({
          error: error.code,
          message: error.message,
        });
      }
      logger.error({ requestId, error: errorMessage(error) }, 'Verify handler error');
      throw error;
    } finally {
      reply.raw.removeListener('close', onClose);
    }
  };
}
