import { BackendKind, SourceHit } from '../entities/SourceHit.js';

/**
 * Capability shared by every search backend.
 * Implementations reject with SearchError; a call never outlives its configured timeout
 * and gives up its request once `signal` aborts.
 */
export interface ISearchAdapter {
  readonly kind: BackendKind;

  search(query: string, count: number, signal?: AbortSignal): Promise<SourceHit[]>;
}

export type SearchAdapterRegistry = ReadonlyMap<BackendKind, ISearchAdapter>;
