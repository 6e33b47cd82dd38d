/**
 * Search orchestration use-case.
 *
 * Wraps a single upstream lookup with timing and a fixed fallback:
 * - calls the search source once (no retry)
 * - on any failure, substitutes direct links to Wikipedia and DuckDuckGo
 * - always resolves with a complete SearchResponse
 *
 * Serves the /api/search endpoint. One instance is built at startup and
 * shared read-only by every request.
 */
import { performance } from "perf_hooks";

import { ENGINE_NAME } from "@config/index";
import type {
  SearchSourceError,
  SearchSourcePort,
} from "@domain/search/ports";
import type {
  SearchMode,
  SearchResponse,
  SearchResult,
} from "@domain/search/types";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { percentEncode } from "@utils/url";

export interface SearchOrchestratorOptions {
  source: SearchSourcePort;
  limit?: number;
  engine?: string;
  now?: () => number;
}

export function fallbackResults(query: string): SearchResult[] {
  const encoded = percentEncode(query);

  return [
    {
      title: `Search Wikipedia for: ${query}`,
      snippet:
        "Live search source unavailable here, so use this direct Wikipedia query link.",
      url: `https://en.wikipedia.org/w/index.php?search=${encoded}`,
    },
    {
      title: `Search DuckDuckGo for: ${query}`,
      snippet: "Open web results directly in DuckDuckGo.",
      url: `https://duckduckgo.com/?q=${encoded}`,
    },
  ];
}

export class SearchOrchestrator {
  private readonly source: SearchSourcePort;
  private readonly limit: number | undefined;
  private readonly engine: string;
  private readonly now: () => number;

  constructor(options: SearchOrchestratorOptions) {
    this.source = options.source;
    this.limit = options.limit;
    this.engine = options.engine ?? ENGINE_NAME;
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Expects a trimmed, non-empty query; the HTTP layer rejects anything else.
   */
  async search(query: string): Promise<SearchResponse> {
    const startedAt = this.now();

    const outcome = await this.source.fetchResults(query, this.limit);

    const { results, mode } = outcome.match(
      (live): { results: SearchResult[]; mode: SearchMode } => ({
        results: live,
        mode: "live",
      }),
      (failure): { results: SearchResult[]; mode: SearchMode } => {
        this.reportFailure(query, failure);
        return { results: fallbackResults(query), mode: "fallback" };
      }
    );

    const elapsedMs = Math.max(0, Math.trunc(this.now() - startedAt));

    logEvent("SEARCH_COMPLETED", {
      mode,
      queryLength: query.length,
      resultCount: results.length,
      elapsedMs,
    });

    return {
      query,
      engine: this.engine,
      elapsed_ms: elapsedMs,
      results,
    };
  }

  private reportFailure(query: string, failure: SearchSourceError): void {
    logger.log("warn", "SEARCH_FALLBACK", {
      kind: failure.kind,
      status: failure.status,
      error: failure.message,
      queryLength: query.length,
    });
  }
}
