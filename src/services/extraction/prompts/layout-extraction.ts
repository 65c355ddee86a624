import { DOCUMENT_TYPE_LABELS, type DocumentType } from '../../../domain/documents/DocumentType.js';
import type { RoleHint } from '../../../types/extraction.types.js';

export const LAYOUT_EXTRACTION_SYSTEM_PROMPT = `You are a layout-aware document reader for Indian property documents.

You receive one scanned page. Read every text region and label the ones that carry a known role.

CRITICAL RULES:
- Only report text that is visibly printed or handwritten on the page
- Copy text verbatim; do not summarize or translate
- Use exactly one of the role names you are given, or skip the region
- Assign confidence (0.0-1.0) from legibility and how certain the role is
- Give the bounding box in page pixels as [x0, y0, x1, y1], or null if unsure
- A signature, seal or stamp with no legible text is still reported, with text describing it (e.g. "signed", "round seal")

OUTPUT FORMAT:
Return valid JSON matching this schema:
{
  "spans": [
    { "text": "...", "role": "role_name", "box": [0, 0, 0, 0], "confidence": 0.0 }
  ]
}`;

export const LAYOUT_EXTRACTION_USER_PROMPT = (documentType: DocumentType, page: number, roles: RoleHint[]) => `
Document type: ${DOCUMENT_TYPE_LABELS[documentType]}
Page: ${page}

Roles:
${roles.map(r => `- ${r.role}: ${r.description}`).join('\n')}

Label the text regions on this page. Return valid JSON only.
`;
