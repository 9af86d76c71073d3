import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    server: {
      deps: {
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/cli/program.ts",
        "src/cli/runtime.ts",
        "src/cli/commands/run.ts",
        "src/cli/commands/discover.ts",
        "src/cli/commands/profile.ts",
        "src/cli/commands/linkedin.ts",
        "src/cli/commands/doctor.ts",
        "src/sheets/google.ts",
        "src/pipeline/types.ts",
        "src/sources/types.ts",
        "src/sheets/transport.ts",
        "src/ai/types.ts",
        "src/config/types.ts",
      ],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 70,
      },
    },
  },
});
