#!/usr/bin/env tsx
/**
 * @revtrack/cli - Command-line interface for revtrack
 *
 * Prints the recent revision history of a Wikipedia article.
 */

import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';
import { runCli } from './program.js';

// Settings from a .env in the working directory; real environment wins
const envPath = resolve(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenvConfig({ path: envPath });
}

process.exitCode = await runCli(process.argv);
