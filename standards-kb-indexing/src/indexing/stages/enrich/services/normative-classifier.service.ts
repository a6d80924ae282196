import { Injectable } from '@nestjs/common';
import type { NormativeIndicator } from '../types';

const NORMATIVE_MARKER = /\(normative\)/i;
const INFORMATIVE_MARKER = /\(informative\)/i;
const NORMATIVE_KEYWORDS = /\b(?:SHALL|MUST|REQUIRED|SHOULD|RECOMMENDED)\b/i;
const INFORMATIVE_KEYWORDS = /\b(?:MAY|OPTIONAL|CAN|NOTE|EXAMPLE)\b/i;

/**
 * Classify a passage of a standards document.
 *
 * Explicit "(normative)" / "(informative)" markers in the text or its
 * section path decide first; otherwise the first keyword group that matches
 * as a whole word (requirement verbs, then permissive or explanatory
 * words). Nothing found, or blank text, gives 'unknown'.
 */
export function classifyNormative(
  text: string,
  sectionPath: string = '',
): NormativeIndicator {
  if (NORMATIVE_MARKER.test(sectionPath) || NORMATIVE_MARKER.test(text)) {
    return 'normative';
  }
  if (INFORMATIVE_MARKER.test(sectionPath) || INFORMATIVE_MARKER.test(text)) {
    return 'informative';
  }
  if (NORMATIVE_KEYWORDS.test(text)) {
    return 'normative';
  }
  if (INFORMATIVE_KEYWORDS.test(text)) {
    return 'informative';
  }
  return 'unknown';
}

/** Storage form: true, false or null */
export function toNormativeFlag(indicator: NormativeIndicator): boolean | null {
  switch (indicator) {
    case 'normative':
      return true;
    case 'informative':
      return false;
    case 'unknown':
      return null;
  }
}

@Injectable()
export class NormativeClassifierService {
  classify(text: string, sectionPath?: string): NormativeIndicator {
    return classifyNormative(text, sectionPath);
  }
}
