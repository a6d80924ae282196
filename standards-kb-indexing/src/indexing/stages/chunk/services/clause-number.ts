// "6.4.2", "5", "A.1.2"; a lone annex letter ("Annex A") is not a clause
const CLAUSE_PATTERN = /^\s*((?:[A-Z]\.)?\d+(?:\.\d+)*)(?=[\s.):]|$)/;

export function matchClauseNumber(text: string): string | null {
  const match = CLAUSE_PATTERN.exec(text);
  return match ? match[1] : null;
}

/**
 * Clause number of a chunk: from its innermost heading, else from the first
 * line of its body
 */
export function extractClauseNumber(
  heading: string | null,
  body: string,
): string | null {
  if (heading) {
    const fromHeading = matchClauseNumber(heading);
    if (fromHeading) {
      return fromHeading;
    }
  }
  const firstLine = body.split('\n', 1)[0] ?? '';
  return matchClauseNumber(firstLine);
}
