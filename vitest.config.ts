import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    pool: "forks",
    poolOptions: {
      // heap checks in dataset.test.ts call gc()
      forks: { execArgv: ["--expose-gc"] },
    },
  },
});
