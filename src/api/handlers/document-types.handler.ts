import type { FastifyReply, FastifyRequest } from 'fastify';
import { DOCUMENT_TYPES, DOCUMENT_TYPE_LABELS } from '../../domain/documents/DocumentType.js';
import { getSchema } from '../../domain/documents/schemas.js';
import { getChecklist } from '../../services/llm/prompts/index.js';
import { SUPPORTED_EXTENSIONS } from '../../services/extraction/media.js';

export function createDocumentTypesHandler() {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const documentTypes = DOCUMENT_TYPES.map(type => ({
      type,
      label: DOCUMENT_TYPE_LABELS[type],
      fields: getSchema(type).fields.map(f => ({ name: f.name, kind: f.kind, description: f.description })),
      checklist: [...getChecklist(type)],
    }));

    return reply.code(200).send({
      document_types: documentTypes,
      supported_extensions: SUPPORTED_EXTENSIONS,
    });
  };
}
