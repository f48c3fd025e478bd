import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    pool: "forks",
    unstubEnvs: true,
    unstubGlobals: true,
  },
});
