import { ExtractedContent } from '../entities/SourceHit.js';

/**
 * Interface for page content extraction
 */
export interface IContentExtractor {
  /**
   * Fetch a page and reduce it to bounded plain text.
   * Rejects with ExtractionError. The request is dropped once `signal` aborts.
   */
  extract(url: string, signal?: AbortSignal): Promise<Omit<ExtractedContent, 'backendKind'>>;
}
