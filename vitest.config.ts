import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [
      { find: /^#types\/(.*)$/, replacement: fileURLToPath(new URL("./types/src/$1", import.meta.url)) },
      { find: /^#server\/(.*)$/, replacement: fileURLToPath(new URL("./server/src/$1", import.meta.url)) },
    ],
  },
  test: {
    include: ["server/src/**/*.test.ts", "types/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
