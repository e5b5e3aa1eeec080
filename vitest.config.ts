import { defineConfig } from "vitest/config";

export default defineConfig({
  // Tests are hermetic: never read local `.env` files with provider keys or database URLs.
  envDir: ".vitest-env",
  test: {
    globals: true,
    pool: "threads",
    include: ["packages/**/src/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
  },
});
