import { transformWithEsbuild } from "vite";
import { defineConfig } from "vitest/config";

export default defineConfig({
  // Vite's built-in esbuild step forces keepNames off, so esbuild renames
  // named function expressions that shadow an outer binding (`broken` →
  // `broken2`). Transform TypeScript here with keepNames so Function#name
  // matches what tsc emits.
  esbuild: false,
  plugins: [
    {
      name: "hearth:esbuild-keep-names",
      enforce: "pre",
      async transform(code, id) {
        if (!/\.(m?ts|tsx)$/.test(id.split("?")[0])) return null;
        const result = await transformWithEsbuild(code, id, {
          target: "esnext",
          charset: "utf8",
          sourcemap: true,
          keepNames: true,
        });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  test: {
    include: ["src/**/*.test.ts", "tests/unit/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/types/**"],
      thresholds: {
        lines: 70,
        functions: 70,
        statements: 70,
        branches: 55,
      },
    },
    restoreMocks: true,
    pool: "forks",
    poolOptions: {
      forks: { maxForks: 4 },
    },
  },
});
