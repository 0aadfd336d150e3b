import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fixalg/core",
    environment: "node",
  },
});
