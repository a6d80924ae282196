/**
 * Standards-style citations: "Title, Clause 6.4.2 (Verification), p.23"
 */

import type { SearchResult } from '../types';

const PREFIXED_CLAUSE = /^(?:section|clause)/i;

export function formatCitation(
  documentTitle: string,
  clauseNumber?: string | null,
  pageNumbers?: readonly number[] | null,
  sectionTitle?: string | null,
): string {
  const components = [documentTitle];

  if (clauseNumber) {
    let clausePart = PREFIXED_CLAUSE.test(clauseNumber)
      ? clauseNumber
      : `Clause ${clauseNumber}`;
    // Section title is only shown next to a clause
    if (sectionTitle) {
      clausePart = `${clausePart} (${sectionTitle})`;
    }
    components.push(clausePart);
  }

  if (pageNumbers && pageNumbers.length > 0) {
    components.push(
      pageNumbers.length === 1
        ? `p.${pageNumbers[0]}`
        : `pp.${Math.min(...pageNumbers)}-${Math.max(...pageNumbers)}`,
    );
  }

  return components.join(', ');
}

export function citeSearchResult(
  result: SearchResult,
  includeRelevance: boolean = true,
): string {
  const citation = formatCitation(
    result.documentTitle,
    result.clauseNumber,
    result.pageNumbers,
    result.sectionTitle,
  );
  if (!includeRelevance) {
    return citation;
  }
  return `${citation} (${Math.trunc(result.score * 100)}% relevant)`;
}
