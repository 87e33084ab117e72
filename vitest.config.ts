import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Tests set process.env (TZ, .env loading); each file gets its own process
    pool: "forks",
  },
});
