/**
 * A single normalized hit, either parsed from the upstream payload or a
 * synthesized fallback link.
 */
export interface SearchResult {
  readonly title: string;
  readonly snippet: string;
  readonly url: string;
}

export type SearchMode = "live" | "fallback";

export interface SearchResponse {
  query: string;
  engine: string;
  elapsed_ms: number;
  results: SearchResult[];
}
