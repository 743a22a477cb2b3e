import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@automata-diagrams/automata",
    globals: true,
    environment: "node",
    // config tests change the working directory, which worker threads cannot do
    pool: "forks",
  },
});
