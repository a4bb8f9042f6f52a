import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["geom-loss/tests/**/*.spec.ts"],
    environment: "node",
  },
});
