import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const queueSources = (dir: string) =>
  fileURLToPath(new URL(`./packages/priority-queue/src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@app": queueSources("application"),
      "@domain": queueSources("domain"),
      "@infra": queueSources("infrastructure"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
  },
});
