import { z } from 'zod';
import { ExtractionError } from '../../utils/errors.js';
import type { LayoutSpan } from '../../types/extraction.types.js';

const clampConfidence = (value: number): number => {
  // Some models answer in percent.
  const scaled = value > 1 ? value / 100 : value;
  return Math.max(0, Math.min(1, scaled));
};

const boxSchema = z.union([
  z.tuple([z.number(), z.number(), z.number(), z.number()]).transform(([x0, y0, x1, y1]) => ({ x0, y0, x1, y1 })),
  z.object({ x0: z.number(), y0: z.number(), x1: z.number(), y1: z.number() }),
]);

const spanSchema = z.object({
  text: z.string(),
  role: z.string().min(1),
  box: boxSchema.nullish().transform(box => box ?? null),
  confidence: z.number().transform(clampConfidence),
});

export const layoutResponseSchema = z.object({
  spans: z.array(spanSchema),
  model: z.string().optional(),
});

export type ParsedLayoutResponse = z.infer<typeof layoutResponseSchema>;

/** Validates an already-decoded layout payload; a bad shape is an extraction failure, not a retry. */
export function parseLayoutPayload(payload: unknown, source: string): { spans: LayoutSpan[]; model?: string } {
  const result = layoutResponseSchema.safeParse(payload);
  if (!result.success) {
    throw new ExtractionError(`Malformed layout response from ${source}`, result.error.issues);
  }
  return result.data;
}

export function parseLayoutJson(raw: string, source: string): { spans: LayoutSpan[]; model?: string } {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new ExtractionError(`Layout response from ${source} is not valid JSON`, error);
  }
  return parseLayoutPayload(payload, source);
}
