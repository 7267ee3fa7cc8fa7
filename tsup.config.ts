import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';
import { join } from 'path';

interface PackageManifest {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
}

function isDependencyMap(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((version) => typeof version === 'string')
  );
}

function readManifest(): PackageManifest {
  const parsed: unknown = JSON.parse(
    readFileSync(join(process.cwd(), 'package.json'), 'utf-8'),
  );

  if (typeof parsed !== 'object' || parsed === null) {
    return {};
  }

  const manifest: PackageManifest = {};

  for (const field of [
    'dependencies',
    'peerDependencies',
    'devDependencies',
  ] as const) {
    const value: unknown = Reflect.get(parsed, field);
    if (isDependencyMap(value)) {
      manifest[field] = value;
    }
  }

  return manifest;
}

// Everything the manifest lists stays external, dev dependencies included,
// so the published bundle never inlines a third-party package.
function collectExternals(manifest: PackageManifest): string[] {
  const names = new Set<string>();

  for (const map of [
    manifest.dependencies,
    manifest.peerDependencies,
    manifest.devDependencies,
  ]) {
    for (const name of Object.keys(map ?? {})) {
      names.add(name);
    }
  }

  return Array.from(names).sort();
}

export default defineConfig({
  entry: ['src/index.ts'],
  outDir: 'dist',
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  external: collectExternals(readManifest()),
});
