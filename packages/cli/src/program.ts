/**
 * Command-line program definition
 */

import { Command, CommanderError } from 'commander';
import { VERSION } from '@revtrack/core';
import { historyCommand } from './commands/history.js';

export interface RunOptions {
  /** Environment to read configuration from */
  env?: Record<string, string | undefined>;
}

export function createProgram(onTitle: (title: string | undefined) => Promise<void>): Command {
  const program = new Command();

  program
    .name('revtrack')
    .description('Show the most recent edits of a Wikipedia article')
    .version(VERSION)
    .argument('[title]', 'Article title, as it appears on Wikipedia')
    .allowExcessArguments(false)
    // Titles such as "-30-" start with a dash; unknown options become the title
    .allowUnknownOption()
    .exitOverride()
    .action(onTitle);

  return program;
}

/**
 * Parse argv (node-style, including executable and script) and run
 *
 * Resolves with the process exit code.
 */
export async function runCli(argv: string[], options: RunOptions = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram(async (title) => {
    exitCode = await historyCommand(title, { env: options.env });
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
