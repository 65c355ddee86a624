import { DOCUMENT_TYPES } from '../../domain/documents/DocumentType.js';

const verdictItemSchema = {
  type: 'object',
  properties: {
    label: { type: 'string' },
    explanation: { type: 'string' },
  },
  required: ['label', 'explanation'],
} as const;

export const verifyQuerySchema = {
  type: 'object',
  properties: {
    document_type: { type: 'string' },
  },
} as const;

export const verificationRecordSchema = {
  type: 'object',
  properties: {
    document_type: { type: 'string', enum: DOCUMENT_TYPES },
    extracted_fields: {
      type: 'object',
      additionalProperties: { type: 'string' },
    },
    benefits: { type: 'array', items: verdictItemSchema },
    risks: { type: 'array', items: verdictItemSchema },
    status: { type: 'string', enum: ['success', 'partial_failure', 'failed'] },
    degraded_fields: { type: 'array', items: { type: 'string' } },
    completeness_score: { type: 'number' },
    failure: {
      type: 'object',
      properties: {
        reason: { type: 'string' },
        message: { type: 'string' },
      },
      required: ['reason', 'message'],
    },
  },
  required: [
    'document_type',
    'extracted_fields',
    'benefits',
    'risks',
    'status',
    'degraded_fields',
    'completeness_score',
  ],
} as const;

export const documentTypesResponseSchema = {
  type: 'object',
  properties: {
    document_types: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          type: { type: 'string' },
          label: { type: 'string' },
          fields: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                name: { type: 'string' },
                kind: { type: 'string' },
                description: { type: 'string' },
              },
              required: ['name', 'kind', 'description'],
            },
          },
          checklist: { type: 'array', items: { type: 'string' } },
        },
        required: ['type', 'label', 'fields', 'checklist'],
      },
    },
    supported_extensions: { type: 'array', items: { type: 'string' } },
  },
  required: ['document_types', 'supported_extensions'],
} as const;
