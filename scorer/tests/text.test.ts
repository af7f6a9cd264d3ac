/**
 * Tests for the markdown text helpers
 */

import { describe, it, expect } from 'vitest';

import {
  bodyParagraphs,
  containsAny,
  countOccurrences,
  countOutOfOrderSections,
  countWords,
  extractSections,
  splitParagraphs,
  splitSentences,
  wordCountDeviation,
} from '../src/text.js';

describe('countWords', () => {
  it('ignores markdown syntax characters', () => {
    expect(countWords('# Title\n\n**Bold** word')).toBe(3);
  });

  it('returns 0 for empty or whitespace-only text', () => {
    expect(countWords('')).toBe(0);
    expect(countWords('  \n\t ')).toBe(0);
  });

  it('drops heading markers but keeps list dashes', () => {
    expect(countWords('## \n- item')).toBe(2);
  });
});

describe('wordCountDeviation', () => {
  it('is a signed percentage of the target', () => {
    expect(wordCountDeviation(2100, 2000)).toBeCloseTo(5);
    expect(wordCountDeviation(1500, 2000)).toBeCloseTo(-25);
  });

  it('is 0 for a zero target', () => {
    expect(wordCountDeviation(120, 0)).toBe(0);
  });
});

describe('sections and paragraphs', () => {
  it('extracts lowercased H2 titles only', () => {
    expect(extractSections('# Title\n## One\n### Sub\n## Two Words')).toEqual(['one', 'two words']);
  });

  it('splits paragraphs on blank lines, including whitespace-only ones', () => {
    expect(splitParagraphs('First.\n\nSecond.\n   \nThird.\n\n\n')).toEqual([
      'First.',
      'Second.',
      'Third.',
    ]);
  });

  it('excludes lone headings from body paragraphs', () => {
    expect(bodyParagraphs('# Title\n\n## Section\nText under it.\n\nMore text.')).toEqual([
      '## Section\nText under it.',
      'More text.',
    ]);
  });

  it('splits sentences on periods and drops empties', () => {
    expect(splitSentences('One. Two.. Three')).toEqual(['One', 'Two', 'Three']);
  });
});

describe('matching helpers', () => {
  it('counts non-overlapping occurrences', () => {
    expect(countOccurrences('aaaa', 'aa')).toBe(2);
    expect(countOccurrences('abc', '')).toBe(0);
  });

  it('ignores empty needles in containsAny', () => {
    expect(containsAny('anything', [''])).toBe(false);
    expect(containsAny('depends on age', ['varies', 'depends on'])).toBe(true);
  });

  it('reports expected sections found out of order', () => {
    const order = ['anatomy', 'symptoms', 'diagnosis', 'treatment', 'recovery'];
    expect(countOutOfOrderSections(['treatment plan', 'anatomy'], order)).toEqual({
      found: 2,
      outOfOrder: 1,
    });
    expect(countOutOfOrderSections(['overview', 'faq'], order)).toEqual({ found: 0, outOfOrder: 0 });
  });
});
