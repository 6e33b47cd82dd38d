import type { ResultAsync } from "neverthrow";

import type { SearchResult } from "./types";

export type SearchSourceErrorKind = "network" | "http" | "timeout" | "parse";

/**
 * Failure marker returned by a search source. The kind is informational;
 * the orchestrator handles every kind the same way.
 */
export interface SearchSourceError {
  kind: SearchSourceErrorKind;
  message: string;
  status?: number;
}

/**
 * Domain port for the upstream full-text search.
 *
 * Implementations never throw or reject: every failure is returned as an
 * `err(SearchSourceError)`.
 */
export interface SearchSourcePort {
  fetchResults(
    query: string,
    limit?: number
  ): ResultAsync<SearchResult[], SearchSourceError>;
}
