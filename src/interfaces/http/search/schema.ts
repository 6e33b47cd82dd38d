import { z } from "zod";

export const QUERY_REQUIRED_MESSAGE = "Query parameter 'q' is required.";

/**
 * Query-string schema for GET /api/search.
 *
 * A repeated `q` uses its first non-empty value. The query is trimmed and
 * must be non-empty afterwards.
 */
export const SearchRequestSchema = z.object({
  q: z.preprocess(
    (value) =>
      Array.isArray(value) ? value.find((item) => item !== "") ?? "" : value,
    z
      .string({
        required_error: QUERY_REQUIRED_MESSAGE,
        invalid_type_error: QUERY_REQUIRED_MESSAGE,
      })
      .trim()
      .min(1, QUERY_REQUIRED_MESSAGE)
  ),
});

export const SearchResultSchema = z.object({
  title: z.string(),
  snippet: z.string(),
  url: z.string().url(),
});

/**
 * Shape of the JSON body returned by GET /api/search.
 */
export const SearchResponseSchema = z.object({
  query: z.string().min(1),
  engine: z.string(),
  elapsed_ms: z.number().int().nonnegative(),
  results: z.array(SearchResultSchema),
});

