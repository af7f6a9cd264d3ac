/**
 * Markdown text helpers shared by the scorer and the validator
 */

const MARKUP_TOKENS = /[#*_`[\]()]/g;

/**
 * Counts words after removing markdown syntax characters.
 */
export function countWords(content: string): number {
  const text = content.replace(MARKUP_TOKENS, '').replace(/\s+/g, ' ').trim();
  return text === '' ? 0 : text.split(' ').length;
}

/**
 * Percentage deviation of actual from target; 0 when the target is 0.
 */
export function wordCountDeviation(actual: number, target: number): number {
  if (target === 0) {
    return 0;
  }
  return ((actual - target) / target) * 100;
}

/**
 * Lowercased H2 titles in document order. H3 and deeper are ignored.
 */
export function extractSections(content: string): string[] {
  return content
    .split('\n')
    .filter((line) => line.startsWith('##') && !line.startsWith('###'))
    .map((line) => line.replace(/^##/, '').trim().toLowerCase());
}

export function isHeading(line: string): boolean {
  return /^#{1,6}\s/.test(line.trim());
}

/**
 * Blank-line separated blocks, trimmed, empties removed.
 */
export function splitParagraphs(content: string): string[] {
  return content
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Paragraphs that are not a lone heading line.
 */
export function bodyParagraphs(content: string): string[] {
  return splitParagraphs(content).filter((p) => !(isHeading(p) && !p.includes('\n')));
}

/**
 * Period-delimited sentences, trimmed, empties removed.
 */
export function splitSentences(content: string): string[] {
  return content
    .split('.')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Non-overlapping occurrences of a literal needle.
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle === '') {
    return 0;
  }
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export function countAll(haystack: string, needles: readonly string[]): number {
  return needles.reduce((sum, needle) => sum + countOccurrences(haystack, needle), 0);
}

export function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((needle) => needle !== '' && haystack.includes(needle));
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Number of regex matches; the pattern is compiled with the global flag.
 */
export function countMatches(content: string, pattern: string): number {
  return content.match(new RegExp(pattern, 'g'))?.length ?? 0;
}

export function countAllMatches(content: string, patterns: readonly string[]): number {
  return patterns.reduce((sum, pattern) => sum + countMatches(content, pattern), 0);
}

/**
 * Checks whether the found expected sections appear in the expected order.
 * Returns the number of expected sections that appear before an earlier one.
 */
export function countOutOfOrderSections(sections: readonly string[], expectedOrder: readonly string[]): {
  found: number;
  outOfOrder: number;
} {
  const positions = new Map<string, number>();

  sections.forEach((section, index) => {
    const expected = expectedOrder.find((name) => section.includes(name));
    if (expected !== undefined) {
      positions.set(expected, index);
    }
  });

  let outOfOrder = 0;
  let previous = -1;
  for (const expected of expectedOrder) {
    const position = positions.get(expected);
    if (position === undefined) continue;
    if (position < previous) {
      outOfOrder++;
    }
    previous = position;
  }

  return { found: positions.size, outOfOrder };
}
