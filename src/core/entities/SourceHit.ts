export const BACKEND_KINDS = ['web', 'academic'] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

export const SEARCH_ERROR_KINDS = ['RateLimited', 'Unreachable', 'Malformed'] as const;

export type SearchErrorKind = (typeof SEARCH_ERROR_KINDS)[number];

export type ExtractionErrorKind = 'FetchFailed' | 'Unsupported' | 'TooLarge';

export interface AcademicMetadata {
  authors: string;
  year: string;
  venue: string;
  abstract: string;
}

/**
 * One result record returned by a backend, before content extraction
 */
export interface SourceHit {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly backendKind: BackendKind;
  readonly metadata?: Readonly<AcademicMetadata>;
}

/**
 * Readable content extracted for a hit
 */
export interface ExtractedContent {
  title: string;
  url: string;
  description: string;
  content: string;
  backendKind: BackendKind;
  extractedAt: Date;
}
