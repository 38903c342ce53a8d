// pattern: Imperative Shell
import { defineConfig, mergeConfig } from "vitest/config";

import workspaceConfig from "../../vitest.config.js";

export default mergeConfig(
  workspaceConfig,
  defineConfig({
    test: {
      // Unit tests for this package, run beside their sources
      include: ["src/**/*.{test,spec}.ts"],
      exclude: ["node_modules", "dist"],

      coverage: {
        provider: "v8",
        reporter: ["text", "json", "html"],
        include: ["src/**/*.ts"],
        exclude: [
          "node_modules",
          "dist",
          "**/*.{test,spec}.ts",
          "**/*.d.ts",
          "src/test-utils/**",
        ],
      },
    },
  })
);
