import react from "@vitejs/plugin-react";
import { defineConfig } from "vite";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

// Workspace sources import each other with `.js` endings.
function resolveTsFromJsExtension() {
  return {
    name: "resolve-ts-from-js-extension",
    enforce: "pre" as const,
    resolveId(source: string, importer?: string) {
      if (!importer) return null;
      if (!source.startsWith("./") && !source.startsWith("../")) return null;
      if (!source.endsWith(".js")) return null;

      const absImporter = importer.startsWith("file://") ? fileURLToPath(importer) : importer;
      const importerDir = path.dirname(absImporter);

      for (const ext of [".ts", ".tsx"]) {
        const candidate = path.resolve(importerDir, source.replace(/\.js$/, ext));
        if (fs.existsSync(candidate)) return candidate;
      }
      return null;
    }
  };
}

export default defineConfig({
  plugins: [resolveTsFromJsExtension(), react()],
  server: {
    port: 5173
  }
});
