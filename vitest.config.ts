import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    include: ["packages/*/tests/**/*.test.{ts,tsx}"],
    environment: "node",
    environmentMatchGlobs: [["packages/react/**", "jsdom"]],
  },
});
