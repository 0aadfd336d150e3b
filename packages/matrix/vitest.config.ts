import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fixalg/matrix",
    environment: "node",
  },
});
