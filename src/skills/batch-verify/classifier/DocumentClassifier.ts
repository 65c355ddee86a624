import { logger } from '../../../utils/logger.js';
import type { DocumentType } from '../../../domain/documents/DocumentType.js';
import type { ClassificationResult } from '../types.js';

interface PatternRule {
  type: DocumentType;
  filenamePatterns: RegExp[];
  weight: number;
}

const PATTERN_RULES: PatternRule[] = [
  {
    type: 'rent_agreement',
    filenamePatterns: [/rent/i, /lease/i, /leave[\s_-]*(?:and|&)[\s_-]*licen[cs]e/i, /tenan(?:t|cy)/i],
    weight: 1.0,
  },
  {
    type: 'title_deed',
    filenamePatterns: [/title/i, /deed/i, /conveyance/i, /sale[\s_-]*agreement/i],
    weight: 1.0,
  },
  {
    type: 'noc',
    filenamePatterns: [/(?:^|[^a-z])noc(?:[^a-z]|$)/i, /no[\s_-]*objection/i],
    weight: 1.2,
  },
];

export const CONFIDENCE_THRESHOLD = 0.5;

/** Guesses the document type from the file name alone; page content is never read. */
export class DocumentClassifier {
  classify(fileName: string): ClassificationResult {
    let best: { type: DocumentType | null; score: number; patterns: string[] } = {
      type: null,
      score: 0,
      patterns: [],
    };

    for (const rule of PATTERN_RULES) {
      const patterns = rule.filenamePatterns.filter(p => p.test(fileName)).map(p => `filename:${p.source}`);
      const score = patterns.length * 0.5 * rule.weight;
      if (score > best.score) {
        best = { type: rule.type, score, patterns };
      }
    }

    const confidence = Math.min(best.score, 1.0);
    const documentType = confidence >= CONFIDENCE_THRESHOLD ? best.type : null;

    logger.debug({ fileName, documentType, confidence }, 'Pattern classification');

    return {
      documentType,
      confidence,
      method: 'pattern',
      patterns: best.patterns,
    };
  }
}
