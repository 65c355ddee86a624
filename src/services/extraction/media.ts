import { extname } from 'path';
import type { MediaKind } from '../../domain/verification/types.js';
import type { PageMediaType } from '../../types/extraction.types.js';

const MEDIA_TYPES: Record<string, { kind: MediaKind; pageType?: PageMediaType }> = {
  'application/pdf': { kind: 'pdf' },
  'image/png': { kind: 'image', pageType: 'image/png' },
  'image/jpeg': { kind: 'image', pageType: 'image/jpeg' },
  'image/jpg': { kind: 'image', pageType: 'image/jpeg' },
};

const EXTENSION_MEDIA_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_MEDIA_TYPES);

export function resolveMediaKind(mediaType: string): { kind: MediaKind; pageType?: PageMediaType } | null {
  const normalized = mediaType.split(';')[0].trim().toLowerCase();
  return MEDIA_TYPES[normalized] ?? null;
}

export function mediaTypeFromFileName(fileName: string): string | null {
  return EXTENSION_MEDIA_TYPES[extname(fileName).toLowerCase()] ?? null;
}
