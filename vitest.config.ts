import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shipctl/test/**/*.test.ts"],
    environment: "node",
  },
});
