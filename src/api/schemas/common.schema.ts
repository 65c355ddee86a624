export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
    details: { type: 'object', additionalProperties: true },
  },
  required: ['error', 'message'],
} as const;

export const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok', 'degraded'] },
    timestamp: { type: 'string' },
    environment: { type: 'string' },
    services: {
      type: 'object',
      properties: {
        extraction: { type: 'boolean' },
        reasoning: { type: 'boolean' },
      },
      required: ['extraction', 'reasoning'],
    },
  },
  required: ['status', 'timestamp', 'services'],
} as const;
