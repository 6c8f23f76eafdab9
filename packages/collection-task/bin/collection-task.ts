#!/usr/bin/env tsx
/**
 * collection-task CLI Entry Point
 *
 * @module collection-task-cli
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { createProgram, EXIT_CODES } from '../src/cli/index.js';
import { defaultDependencies } from '../src/cli/lib/context.js';

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(here, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    console.error(`Could not read version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

async function main(): Promise<void> {
  const program = createProgram(defaultDependencies, getVersion());
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.FAILURES);
});
