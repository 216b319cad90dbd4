import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@scriptorium/shared": workspace("shared"),
      "@scriptorium/reservation": workspace("reservation"),
      "@scriptorium/transcription": workspace("transcription"),
      "@scriptorium/editor-client": workspace("editor-client")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"]
  }
});
