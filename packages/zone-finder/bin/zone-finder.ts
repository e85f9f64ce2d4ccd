#!/usr/bin/env node
/**
 * Zone Finder CLI Entry Point
 *
 * @module zone-finder-cli
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runCli } from '../src/cli/index.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Source layout is bin/, built layout is dist/bin/
  for (const packageJsonPath of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    if (!existsSync(packageJsonPath)) continue;
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  }
  return '0.0.0';
}

runCli(process.argv, getVersion())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_CODES.ERRORS;
  });
