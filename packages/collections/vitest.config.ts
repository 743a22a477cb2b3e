import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@automata-diagrams/collections",
    globals: true,
    environment: "node",
  },
});
