/**
 * Section stack helpers. A stack is never mutated; entering a section
 * returns a new frozen array.
 */

export type SectionStack = readonly string[];

export const EMPTY_SECTION_STACK: SectionStack = Object.freeze([]);

/**
 * Enter a heading found at `depth` (number of ancestors the parser reported).
 * Deeper or sibling entries are dropped before the heading is pushed.
 */
export function enterSection(
  stack: SectionStack,
  depth: number,
  title: string,
): SectionStack {
  const keep = Math.max(0, Math.min(depth, stack.length));
  return Object.freeze([...stack.slice(0, keep), title]);
}

export function innermostSection(stack: SectionStack): string | null {
  return stack.length > 0 ? stack[stack.length - 1] : null;
}
