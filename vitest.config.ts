import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Fixture builders used only by tests
        "src/test/**",
        // CLI entry point: wiring only
        "src/index.ts",
      ],
    },
  },
});
