import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { defineConfig } from "tsup";

type PackageJson = {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
};

type TsupConfigInput = {
  entry: string[];
  dts?: boolean;
  externalizeDeps?: boolean;
  executable?: boolean;
};

const readPackageJson = (): PackageJson => {
  const pkgPath = resolve(process.cwd(), "package.json");
  const raw = readFileSync(pkgPath, "utf-8");
  return JSON.parse(raw) as PackageJson;
};

const getExternalDeps = (): string[] => {
  const pkg = readPackageJson();
  return [...Object.keys(pkg.dependencies ?? {}), ...Object.keys(pkg.peerDependencies ?? {})];
};

export const createNodeConfig = ({
  entry,
  dts = false,
  externalizeDeps = false,
  executable = false,
}: TsupConfigInput) =>
  defineConfig({
    entry,
    format: ["esm"],
    target: "node20",
    platform: "node",
    sourcemap: true,
    clean: true,
    dts,
    splitting: true,
    external: externalizeDeps ? getExternalDeps() : undefined,
    // Workspace packages export their sources, so the CLI bundle inlines them.
    noExternal: executable ? [/^@trackpress\//] : undefined,
    banner: executable ? { js: "#!/usr/bin/env node" } : undefined,
  });
