import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";
import packageJson from "./package.json";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  plugins: [
    // Plugin to preserve shebang in the built file
    {
      name: "preserve-shebang",
      generateBundle(_options, bundle) {
        const indexBundle = bundle["index.js"];
        if (indexBundle && indexBundle.type === "chunk" && indexBundle.code) {
          indexBundle.code = `#!/usr/bin/env node\n${indexBundle.code}`;
        }
      },
      writeBundle(options) {
        // Make the index.js file executable after writing
        const indexPath = path.join(options.dir || "dist", "index.js");
        if (fs.existsSync(indexPath)) {
          fs.chmodSync(indexPath, 0o755);
        }
      },
    },
  ],
  define: {
    __APP_VERSION__: JSON.stringify(process.env.APP_VERSION || packageJson.version),
  },
  resolve: {
    extensions: [".ts", ".js", ".json"],
  },
  build: {
    outDir: "dist",
    sourcemap: true,
    emptyOutDir: true,
    lib: {
      entry: {
        index: path.resolve(rootDir, "src/index.ts"),
      },
      formats: ["es"],
    },
    rollupOptions: {
      // Externalize dependencies and node built-ins
      external: [/^node:/, ...Object.keys(packageJson.dependencies || {})],
    },
    target: "node20",
    ssr: true,
  },
  test: {
    globals: true,
    environment: "node",
    testTimeout: 30000,
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
  },
});
