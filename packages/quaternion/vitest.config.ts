import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fixalg/quaternion",
    environment: "node",
  },
});
