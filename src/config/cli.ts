/**
 * Command-line options for the server entry point.
 *
 * `--host` and `--port` override the HOST / PORT environment values.
 */
import { parseArgs } from "util";

import { z } from "zod";

export const ServerOptionsSchema = z.object({
  host: z.string().trim().min(1, "host must not be empty"),
  port: z.coerce
    .number()
    .int("port must be an integer")
    .min(0, "port must be between 0 and 65535")
    .max(65535, "port must be between 0 and 65535"),
});

export type ServerOptions = z.infer<typeof ServerOptionsSchema>;

export function parseServerOptions(
  argv: string[],
  defaults: { host: string; port: number }
): ServerOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      host: { type: "string" },
      port: { type: "string" },
    },
    strict: true,
    allowPositionals: false,
  });

  const parsed = ServerOptionsSchema.safeParse({
    host: values.host ?? defaults.host,
    port: values.port ?? defaults.port,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid server options: ${detail}`);
  }

  return parsed.data;
}
