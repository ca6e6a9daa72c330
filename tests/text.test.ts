import { TRUNCATION_NOTICE, clip, normalizeWhitespace, safeTruncate } from '../src/utils/text.js';
import { isMeaningfulContent } from '../src/utils/contentQuality.js';

describe('safeTruncate', () => {
  test('should return short text unchanged', () => {
    expect(safeTruncate('short text', 100)).toBe('short text');
  });

  test('should never exceed the maximum length', () => {
    const text = 'a'.repeat(500);
    const result = safeTruncate(text, 120);
    expect(result).toHaveLength(120);
    expect(result).toBe(`${'a'.repeat(78)}...\n${TRUNCATION_NOTICE}`);
  });

  test('should prefer a paragraph break in the second half of the budget', () => {
    const text = `${'a'.repeat(60)}\n\n${'b'.repeat(200)}`;
    expect(safeTruncate(text, 120)).toBe(`${'a'.repeat(60)}\n\n${TRUNCATION_NOTICE}`);
  });

  test('should ignore a paragraph break too early in the text', () => {
    const text = `${'a'.repeat(10)}\n\n${'b'.repeat(200)}`;
    const result = safeTruncate(text, 120);
    expect(result).toBe(`${'a'.repeat(10)}\n\n${'b'.repeat(66)}...\n${TRUNCATION_NOTICE}`);
  });

  test('should take a custom notice', () => {
    expect(safeTruncate('abcdefghij', 8, '!')).toBe('abc...\n!');
  });
});

describe('normalizeWhitespace and clip', () => {
  test('should collapse whitespace runs', () => {
    expect(normalizeWhitespace('  a \n\t b   c ')).toBe('a b c');
  });

  test('should cut to the given length', () => {
    expect(clip('abcdef', 3)).toBe('abc');
    expect(clip('abc', 3)).toBe('abc');
  });
});

describe('isMeaningfulContent', () => {
  const GOOD =
    'Photosynthesis converts light energy into chemical energy. Plants store this energy as glucose for later use.';

  test('should accept ordinary prose', () => {
    expect(isMeaningfulContent(GOOD, 'Biology basics', 'Photosynthesis')).toBe(true);
  });

  test('should reject text under fifty characters', () => {
    expect(isMeaningfulContent('Too short to matter. Really short.')).toBe(false);
  });

  test('should reject restricted pages by content, title or description', () => {
    expect(isMeaningfulContent(`${GOOD} Subscription required to continue.`)).toBe(false);
    expect(isMeaningfulContent(GOOD, '', '403 Forbidden')).toBe(false);
    expect(isMeaningfulContent(GOOD, 'Solve the CAPTCHA first')).toBe(false);
  });

  test('should reject navigation-heavy text', () => {
    const nav = 'menu search login sign up cookie policy. toggle navigation skip to main content.';
    expect(isMeaningfulContent(nav)).toBe(false);
  });

  test('should require at least two real sentences', () => {
    expect(
      isMeaningfulContent('This is one long sentence that keeps going without any further punctuation at all')
    ).toBe(false);
  });
});
