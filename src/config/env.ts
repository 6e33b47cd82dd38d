import { z } from "zod";

/** Treats `FOO=` the same as an unset variable. */
function unsetWhenBlank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema);
}

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export const EnvSchema = z.object({
  NODE_ENV: unsetWhenBlank(z.string().default("development")),
  HOST: unsetWhenBlank(z.string().trim().min(1).default("127.0.0.1")),
  PORT: unsetWhenBlank(z.coerce.number().int().min(0).max(65535).default(8000)),
  SEARCH_TIMEOUT_MS: unsetWhenBlank(
    z.coerce.number().int().nonnegative().default(6000)
  ),
  SEARCH_RESULT_LIMIT: unsetWhenBlank(
    z.coerce.number().int().positive().max(500).default(7)
  ),
  ASSET_ROOT: unsetWhenBlank(z.string().optional()),
  LOG_LEVEL: unsetWhenBlank(z.enum(LOG_LEVELS).default("info")),
  LOG_FILE: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${detail}`);
  }

  return parsed.data;
}
