import { z } from "zod";

/**
 * Zod schema for the part of the MediaWiki `list=search` payload we read.
 *
 * `query` and `query.search` may be absent (no hits). When present they must
 * have the expected shape, and hit fields must be strings when present;
 * anything else is a malformed payload.
 */
export const WikipediaHitSchema = z.object({
  title: z.string().optional(),
  snippet: z.string().optional(),
});

export const WikipediaSearchPayloadSchema = z.object({
  query: z
    .object({
      search: z.array(WikipediaHitSchema).optional(),
    })
    .optional(),
});

export type WikipediaHit = z.infer<typeof WikipediaHitSchema>;
