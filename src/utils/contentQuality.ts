const MIN_CONTENT_LENGTH = 50;
const MIN_MEANINGFUL_SENTENCES = 2;
const MIN_SENTENCE_LENGTH = 20;
const MAX_UI_RATIO = 0.3;

// Access walls, error pages and bot checks
const RESTRICTED_PATTERNS = [
  'javascript is disabled',
  'page restricted',
  'access denied',
  '403 forbidden',
  '404 not found',
  '503 service unavailable',
  'login required',
  'subscription required',
  'paywall',
  'please enable javascript',
  'cookies required',
  'captcha',
  'robot verification',
  'cloudflare',
  'enable cookies',
  'browser not supported',
  'content not available',
  'page not found',
  'unauthorized access',
  'permission denied',
];

const NAVIGATION_PATTERNS = [
  'skip to main content',
  'toggle navigation',
  'menu',
  'search',
  'login',
  'sign up',
  'cookie policy',
];

/**
 * Whether extracted text is worth citing: long enough, not an error or
 * access-wall page, not mostly navigation, with at least two real sentences.
 */
export function isMeaningfulContent(content: string, description = '', title = ''): boolean {
  if (content.trim().length < MIN_CONTENT_LENGTH) {
    return false;
  }

  const contentLower = content.toLowerCase();
  const titleLower = title.toLowerCase();
  const descriptionLower = description.toLowerCase();

  const restricted = RESTRICTED_PATTERNS.some(
    (pattern) =>
      contentLower.includes(pattern) || titleLower.includes(pattern) || descriptionLower.includes(pattern)
  );
  if (restricted) {
    return false;
  }

  const navigationHits = NAVIGATION_PATTERNS.filter((pattern) => contentLower.includes(pattern)).length;
  const wordCount = content.split(/\s+/).filter(Boolean).length;
  if (wordCount > 0 && navigationHits / wordCount > MAX_UI_RATIO) {
    return false;
  }

  const sentences = content.split('.').filter((s) => s.trim().length > MIN_SENTENCE_LENGTH);
  return sentences.length >= MIN_MEANINGFUL_SENTENCES;
}
