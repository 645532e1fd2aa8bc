import { defineConfig } from "tsup";
import { readFileSync } from "fs";
import { join } from "path";

interface PackageManifest {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
}

const packageJson: PackageManifest = JSON.parse(
  readFileSync(join(process.cwd(), "package.json"), "utf-8"),
);

// Every declared package stays external; consumers install their own
const allExternals = Array.from(
  new Set([
    ...Object.keys(packageJson.dependencies ?? {}),
    ...Object.keys(packageJson.peerDependencies ?? {}),
    ...Object.keys(packageJson.devDependencies ?? {}),
  ]),
).sort();

const entry = (source: string, outDir: string) => ({
  entry: [source],
  outDir,
  format: ["cjs", "esm"] as ("cjs" | "esm")[],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  external: allExternals,
});

export default defineConfig([
  entry("src/index.ts", "dist/migration"),
  entry("src/cli.ts", "dist/cli"),
  entry("src/lib/db-utilities/test-db-instance.ts", "dist/testing"),
]);
