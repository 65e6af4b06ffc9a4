import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    clearMocks: true,
    restoreMocks: true,
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      // Покрытие считаем для доменных политик и use-case: это чистый код без I/O.
      include: ["src/domain/**/*.ts", "src/application/**/*.ts", "src/log/**/*.ts", "src/settingsStore.ts"],
      exclude: ["tests/**"],
      thresholds: {
        lines: 80,
        statements: 80,
        functions: 80,
        branches: 70,
      },
    },
  },
});
