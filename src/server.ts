/**
 * Application entry point for the Searchlight server.
 *
 * Reads --host / --port (falling back to HOST / PORT), builds the single
 * SearchOrchestrator shared by all requests and starts the Express server.
 */
import { SearchOrchestrator } from "@app/search/SearchUseCase";
import { parseServerOptions } from "@config/cli";
import { config } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import { WikipediaSearchSource } from "@infrastructure/search/WikipediaSearchSource";

import { createApp } from "./app";

function main(): void {
  const options = parseServerOptions(process.argv.slice(2), {
    host: config.host,
    port: config.port,
  });

  const orchestrator = new SearchOrchestrator({
    source: new WikipediaSearchSource(),
    limit: config.search.resultLimit,
  });

  const app = createApp({ orchestrator, assetRoot: config.assetRoot });

  const server = app.listen(options.port, options.host, () => {
    logger.log("info", `Searchlight running at http://${options.host}:${options.port}`, {
      host: options.host,
      port: options.port,
      assetRoot: config.assetRoot,
      timeoutMs: config.search.timeoutMs,
    });
  });

  server.on("error", (err) => {
    logger.log("error", "Server failed", { error: err.message });
    process.exitCode = 1;
  });
}

try {
  main();
} catch (err: unknown) {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
