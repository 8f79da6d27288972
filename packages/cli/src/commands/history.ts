/**
 * history command - Show the recent revisions of one page
 *
 * Thin wrapper around the @revtrack/core history module.
 */

import ora, { type Ora } from 'ora';
import {
  MissingArgumentError,
  EXIT_CODES,
  exitCodeFor,
  isDebugEnabled,
  requirePageHistory,
  resolveHistoryConfig,
} from '@revtrack/core';
import { printDebug, printError, printInfo, printPageHistory } from '../utils/format.js';

export interface HistoryOptions {
  /** Environment to read configuration from */
  env?: Record<string, string | undefined>;
}

function printUsage(): void {
  printInfo('Usage: revtrack <article_name>');
  printInfo('Example: revtrack "Ball State University"');
}

/**
 * Run the command and return the process exit code
 */
export async function historyCommand(title: string | undefined, options: HistoryOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  let spinner: Ora | undefined;

  try {
    if (title === undefined || !title.trim()) {
      throw new MissingArgumentError(
        title === undefined ? 'Article name is required' : 'Article name cannot be empty'
      );
    }

    const config = resolveHistoryConfig(env);
    const debug = isDebugEnabled(env);

    spinner = ora({
      text: `Fetching revisions for ${title}...`,
      stream: process.stderr,
      isSilent: !process.stderr.isTTY,
    }).start();

    const activeSpinner = spinner;
    const history = await requirePageHistory(title, config, {
      onRequest: debug
        ? (url) => {
            activeSpinner.clear();
            printDebug(`GET ${url}`);
          }
        : undefined,
    });

    spinner.stop();
    printPageHistory(history);
    return EXIT_CODES.success;
  } catch (error) {
    spinner?.stop();
    const message = error instanceof Error ? error.message : String(error);
    printError(message);

    if (error instanceof MissingArgumentError) {
      printUsage();
    }

    return exitCodeFor(error);
  }
}
