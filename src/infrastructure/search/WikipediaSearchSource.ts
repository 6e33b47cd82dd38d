/**
 * Wikipedia full-text search adapter (the query translator).
 *
 * Builds a `list=search` request against the MediaWiki API, sends it with a
 * bounded timeout and turns the payload into ordered SearchResults:
 * - highlight markup is stripped from snippets
 * - article URLs are derived from titles
 * - every failure comes back as an `err(SearchSourceError)`
 */
import { config } from "@config/index";
import type {
  SearchSourceError,
  SearchSourcePort,
} from "@domain/search/ports";
import type { SearchResult } from "@domain/search/types";
import { percentEncode } from "@utils/url";
import { Result, ResultAsync, err, errAsync, ok, okAsync } from "neverthrow";

import { WikipediaHit, WikipediaSearchPayloadSchema } from "./schema";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface WikipediaSearchSourceOptions {
  endpoint?: string;
  articleBaseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  defaultLimit?: number;
  fetch?: FetchLike;
}

const HIGHLIGHT_OPEN = '<span class="searchmatch">';
const HIGHLIGHT_CLOSE = "</span>";

/**
 * Removes the literal highlight tags MediaWiki wraps around matched terms.
 * No other markup is touched.
 */
export function normalizeSnippet(raw: string): string {
  return raw.split(HIGHLIGHT_OPEN).join("").split(HIGHLIGHT_CLOSE).join("");
}

export function articleUrl(
  title: string,
  baseUrl: string = config.search.articleBaseUrl
): string {
  return baseUrl + percentEncode(title.replace(/ /g, "_"));
}

export function buildSearchUrl(
  endpoint: string,
  query: string,
  limit: number
): string {
  const params = new URLSearchParams({
    action: "query",
    list: "search",
    srsearch: query,
    srlimit: String(limit),
    utf8: "",
    format: "json",
  });

  return `${endpoint}?${params.toString()}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toRequestError(error: unknown): SearchSourceError {
  const name =
    typeof error === "object" && error !== null && "name" in error
      ? error.name
      : undefined;

  if (name === "TimeoutError" || name === "AbortError") {
    return { kind: "timeout", message: errorMessage(error) };
  }

  return { kind: "network", message: errorMessage(error) };
}

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error): SearchSourceError => ({
    kind: "parse",
    message: `Upstream returned invalid JSON: ${errorMessage(error)}`,
  })
);

const decodeUtf8 = Result.fromThrowable(
  (bytes: ArrayBuffer): string =>
    new TextDecoder("utf-8", { fatal: true }).decode(bytes),
  (error): SearchSourceError => ({
    kind: "parse",
    message: `Upstream body is not valid UTF-8: ${errorMessage(error)}`,
  })
);

function requireSuccess(
  response: Response
): ResultAsync<Response, SearchSourceError> {
  if (response.ok) {
    return okAsync<Response, SearchSourceError>(response);
  }

  return errAsync<Response, SearchSourceError>({
    kind: "http",
    status: response.status,
    message: `Upstream responded with HTTP ${response.status}`,
  });
}

export class WikipediaSearchSource implements SearchSourcePort {
  private readonly endpoint: string;
  private readonly articleBaseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly defaultLimit: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: WikipediaSearchSourceOptions = {}) {
    this.endpoint = options.endpoint ?? config.search.endpoint;
    this.articleBaseUrl = options.articleBaseUrl ?? config.search.articleBaseUrl;
    this.userAgent = options.userAgent ?? config.search.userAgent;
    this.timeoutMs = options.timeoutMs ?? config.search.timeoutMs;
    this.defaultLimit = options.defaultLimit ?? config.search.resultLimit;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  fetchResults(
    query: string,
    limit: number = this.defaultLimit
  ): ResultAsync<SearchResult[], SearchSourceError> {
    const send = ResultAsync.fromThrowable(
      (url: string) =>
        this.fetchImpl(url, {
          method: "GET",
          headers: {
            "User-Agent": this.userAgent,
            Accept: "application/json",
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        }),
      toRequestError
    );

    return send(buildSearchUrl(this.endpoint, query, limit))
      .andThen(requireSuccess)
      .andThen((response) =>
        ResultAsync.fromPromise(response.arrayBuffer(), toRequestError)
      )
      .andThen(decodeUtf8)
      .andThen((body) => this.parsePayload(body));
  }

  parsePayload(body: string): Result<SearchResult[], SearchSourceError> {
    return parseJson(body).andThen((payload) => {
      const parsed = WikipediaSearchPayloadSchema.safeParse(payload);

      if (!parsed.success) {
        return err<SearchResult[], SearchSourceError>({
          kind: "parse",
          message: `Unexpected upstream payload: ${parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
            .join("; ")}`,
        });
      }

      const hits = parsed.data.query?.search ?? [];
      return ok<SearchResult[], SearchSourceError>(
        hits.map((hit) => this.toResult(hit))
      );
    });
  }

  private toResult(hit: WikipediaHit): SearchResult {
    const title = hit.title ?? "Untitled";

    return {
      title,
      snippet: normalizeSnippet(hit.snippet ?? ""),
      url: articleUrl(title, this.articleBaseUrl),
    };
  }
}
