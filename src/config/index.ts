/**
 * Centralized configuration for the Searchlight server.
 *
 * Values come from the process environment (optionally seeded from a .env
 * file), are validated by EnvSchema and read once at startup:
 * - HTTP bind address (host, port)
 * - Upstream search settings (timeout, result limit)
 * - Static asset root
 * - Logging level and log file
 */
import path from "path";

import dotenv from "dotenv";

import { loadEnv } from "./env";

dotenv.config();

const env = loadEnv(process.env);

export const ENGINE_NAME = "Searchlight";

export const config = {
  env: env.NODE_ENV,

  host: env.HOST,
  port: env.PORT,

  search: {
    endpoint: "https://en.wikipedia.org/w/api.php",
    articleBaseUrl: "https://en.wikipedia.org/wiki/",
    userAgent: `${ENGINE_NAME}/1.0 (+https://localhost)`,
    timeoutMs: env.SEARCH_TIMEOUT_MS,
    resultLimit: env.SEARCH_RESULT_LIMIT,
  },

  assetRoot: path.resolve(env.ASSET_ROOT ?? path.join(process.cwd(), "public")),

  observability: {
    logLevel: env.LOG_LEVEL,
    logFile:
      env.LOG_FILE === undefined
        ? path.join(process.cwd(), "logs", "app.log")
        : env.LOG_FILE,
  },
} as const;
