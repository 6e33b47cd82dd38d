import { fileURLToPath } from "url";

import { defineConfig } from "vitest/config";

const src = (dir: string): string =>
  fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@app": src("app"),
      "@config": src("config"),
      "@domain": src("domain"),
      "@infrastructure": src("infrastructure"),
      "@interfaces": src("interfaces"),
      "@middleware": src("middleware"),
      "@routes": src("routes"),
      "@utils": src("utils"),
    },
  },
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
      LOG_FILE: "",
    },
  },
});
