import { RetrievedChunk } from './course.model';

/**
 * Outcome of one similarity query. A failure never carries hits, and a
 * success with zero hits means "nothing relevant", not "search failed".
 */
export type SearchResults =
  | { ok: true; hits: RetrievedChunk[] }
  | { ok: false; error: string };

export const SearchResults = {
  of(hits: RetrievedChunk[]): SearchResults {
    return { ok: true, hits };
  },

  failure(error: string): SearchResults {
    return { ok: false, error };
  },
};
