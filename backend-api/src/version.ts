import { createRequire } from 'node:module';

// package.json is read through require: the server is built to ESM, where JSON imports need attributes.
const require = createRequire(import.meta.url);

type PackageJson = { version?: string };

function readVersion(): string {
  const pkg: PackageJson = require('../package.json');
  return String(pkg.version ?? '0.0.0');
}

export const backendVersion = readVersion();
