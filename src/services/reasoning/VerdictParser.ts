import { z } from 'zod';
import { collapseWhitespace } from '../../utils/text.js';
import type { VerdictItem } from '../../domain/verification/types.js';

export type VerdictParse =
  | ({ kind: 'structured' } & VerdictLists)
  | ({ kind: 'heuristic' } & VerdictLists)
  | { kind: 'unparseable'; reason: string };

const itemSchema = z.union([
  z.string(),
  z.object({
    label: z.string(),
    explanation: z.string().nullish(),
  }),
]);

const verdictSchema = z
  .object({
    benefits: z.array(itemSchema).optional(),
    risks: z.array(itemSchema).optional(),
  })
  .refine(value => value.benefits !== undefined || value.risks !== undefined, {
    message: 'Verdict needs a benefits or risks list',
  });

type RawItem = z.infer<typeof itemSchema>;

export interface VerdictLists {
  benefits: VerdictItem[];
  risks: VerdictItem[];
}

const VERDICT_TAG_REGEX = /<verdict>([\s\S]*?)<\/verdict>/i;
const FENCED_JSON_REGEX = /```(?:json)?\s*([\s\S]*?)```/i;
const LABEL_SEPARATOR_REGEX = /^(.+?)\s*(?::|—|–|\s-\s)\s*(.+)$/;

/** `"Stamp duty paid: Rs. 500 stated"` becomes label and explanation. */
export function splitLabel(raw: string): VerdictItem {
  const text = collapseWhitespace(raw.replace(/\*\*/g, ''));
  const match = LABEL_SEPARATOR_REGEX.exec(text);
  if (!match) {
    return { label: text, explanation: '' };
  }
  return { label: match[1].trim(), explanation: match[2].trim() };
}

const toItem = (raw: RawItem): VerdictItem =>
  typeof raw === 'string'
    ? splitLabel(raw)
    : { label: collapseWhitespace(raw.label), explanation: collapseWhitespace(raw.explanation ?? '') };

const jsonCandidates = (text: string): string[] => {
  const candidates: string[] = [];
  const tagged = VERDICT_TAG_REGEX.exec(text);
  if (tagged) {
    candidates.push(tagged[1]);
  }
  const fenced = FENCED_JSON_REGEX.exec(text);
  if (fenced) {
    candidates.push(fenced[1]);
  }
  candidates.push(text);
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) {
    candidates.push(text.slice(start, end + 1));
  }
  return candidates;
};

const countItems = (verdict: VerdictLists): number =>
  verdict.benefits.filter(i => i.label.length > 0).length + verdict.risks.filter(i => i.label.length > 0).length;

const tryJson = (candidate: string): unknown => {
  try {
    return JSON.parse(candidate.trim());
  } catch {
    // not JSON, the next candidate or the heuristic pass takes over
    return undefined;
  }
};

interface StructuredResult {
  verdict: VerdictLists | null;
  /** A verdict object was present but listed nothing. */
  sawEmpty: boolean;
}

function parseStructured(text: string): StructuredResult {
  let sawEmpty = false;
  for (const candidate of jsonCandidates(text)) {
    const parsed = verdictSchema.safeParse(tryJson(candidate));
    if (!parsed.success) {
      continue;
    }
    const verdict: VerdictLists = {
      benefits: (parsed.data.benefits ?? []).map(toItem),
      risks: (parsed.data.risks ?? []).map(toItem),
    };
    if (countItems(verdict) > 0) {
      return { verdict, sawEmpty };
    }
    sawEmpty = true;
  }
  return { verdict: null, sawEmpty };
}

type Section = 'benefits' | 'risks' | null;

const HEADING_REGEX =
  /^(?:#{1,6}\s*)?\**\s*(benefits|positives|positive aspects|strengths|pros|risks|concerns|issues|missing clauses|red flags|cons|completeness|summary|recommendations?|conclusion)\s*\**\s*(?::\s*\**\s*(.*))?$/i;
const BULLET_REGEX = /^(?:[-*•]|\d+[.)])\s+/;
const NONE_REGEX = /^(?:none|n\/a|nil)\.?$/i;

const BENEFIT_HEADINGS = new Set(['benefits', 'positives', 'positive aspects', 'strengths', 'pros']);
const RISK_HEADINGS = new Set(['risks', 'concerns', 'issues', 'missing clauses', 'red flags', 'cons']);

const NEGATIVE_INDICATORS =
  /\b(missing|not found|absent|lacks?|lacking|no mention|not mentioned|not specified|unclear|ambiguous|risk|risky|concern|invalid|expired|unsigned|not registered|without)\b/i;
const POSITIVE_INDICATORS =
  /\b(present|clearly|clear|complies|compliant|valid|properly|well[- ]defined|registered|signed|included|specified|mentioned)\b/i;

const sectionFor = (heading: string): Section => {
  const key = heading.toLowerCase();
  if (BENEFIT_HEADINGS.has(key)) {
    return 'benefits';
  }
  if (RISK_HEADINGS.has(key)) {
    return 'risks';
  }
  return null;
};

const cleanLine = (line: string): string => line.trim().replace(BULLET_REGEX, '').trim();

function parseSections(lines: string[]): VerdictLists {
  const result: VerdictLists = { benefits: [], risks: [] };
  let section: Section = null;

  for (const line of lines) {
    const heading = HEADING_REGEX.exec(line.trim());
    if (heading) {
      section = sectionFor(heading[1]);
      const inline = heading[2]?.trim();
      if (section && inline && !NONE_REGEX.test(inline)) {
        result[section].push(splitLabel(inline));
      }
      continue;
    }
    const text = cleanLine(line);
    if (section && text.length > 0 && !NONE_REGEX.test(text)) {
      result[section].push(splitLabel(text));
    }
  }
  return result;
}

function parseIndicators(lines: string[]): VerdictLists {
  const result: VerdictLists = { benefits: [], risks: [] };
  for (const line of lines) {
    const text = cleanLine(line);
    if (text.length === 0 || HEADING_REGEX.test(text)) {
      continue;
    }
    if (NEGATIVE_INDICATORS.test(text)) {
      result.risks.push(splitLabel(text));
    } else if (POSITIVE_INDICATORS.test(text)) {
      result.benefits.push(splitLabel(text));
    }
  }
  return result;
}

/**
 * Reads a free-text model response into benefits and risks. Tries a JSON
 * verdict first, then section headings, then indicator phrases line by line.
 * A response with nothing classifiable is `unparseable`, never an empty verdict.
 */
export function parseVerdict(text: string): VerdictParse {
  if (text.trim().length === 0) {
    return { kind: 'unparseable', reason: 'Reasoning response was empty' };
  }

  const structured = parseStructured(text);
  if (structured.verdict) {
    return { kind: 'structured', ...structured.verdict };
  }

  const lines = text.split(/\r?\n/);
  const sections = parseSections(lines);
  if (countItems(sections) > 0) {
    return { kind: 'heuristic', ...sections };
  }

  const indicators = parseIndicators(lines);
  if (countItems(indicators) > 0) {
    return { kind: 'heuristic', ...indicators };
  }

  return {
    kind: 'unparseable',
    reason: structured.sawEmpty
      ? 'Structured verdict contained no benefits or risks'
      : 'No benefit or risk markers found in reasoning response',
  };
}
