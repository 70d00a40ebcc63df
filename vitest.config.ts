import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = (dir: string) => fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
    // bcrypt work dominates; keep a generous ceiling
    testTimeout: 20_000,
  },
  resolve: {
    alias: {
      "@configs": src("configs"),
      "@controllers": src("controllers"),
      "@middlewares": src("middlewares"),
      "@models": src("models"),
      "@routes": src("routes"),
      "@services": src("services"),
      "@utils": src("utils"),
      types: src("types"),
    },
  },
});
