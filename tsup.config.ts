// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `tsup.config`
 * Purpose: Build configuration for the barline CLI bundle.
 * Scope: Bundles services/barline/src/main.ts with the workspace packages into dist/main.js. Does not contain runtime code.
 * Invariants: ESM format only; workspace packages bundled, npm deps left external.
 * Side-effects: none
 * Links: services/barline/src/main.ts, package.json#bin
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: { main: "services/barline/src/main.ts" },
  outDir: "dist",
  format: ["esm"],
  target: "node20",
  platform: "node",
  bundle: true,
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  banner: { js: "#!/usr/bin/env node" },
  // Workspace packages export TypeScript sources; bundle them in
  noExternal: [/^@barline\//],
  external: ["pino", "yaml", "zod"],
});
