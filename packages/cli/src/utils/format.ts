/**
 * CLI output formatting utilities
 *
 * Data goes to stdout; errors and progress go to stderr.
 */

import chalk from 'chalk';
import type { PageHistory, RevisionRecord } from '@revtrack/core';

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/;

/**
 * Format an ISO timestamp as `YYYY-MM-DD HH:MM:SS` (UTC)
 *
 * Anything that does not parse is returned unchanged.
 */
export function formatTimestamp(timestamp: string): string {
  if (!ISO_TIMESTAMP.test(timestamp)) return timestamp;
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) return timestamp;
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Format one revision for display
 */
export function formatRevisionLine(revision: RevisionRecord): string {
  return `${formatTimestamp(revision.timestamp)} — ${revision.editor}`;
}

/**
 * Format the redirect notice
 */
export function formatRedirectNotice(resolvedTo: string): string {
  return `Redirected to ${resolvedTo}`;
}

/**
 * Print a page history: redirect notice first, then revisions newest-first
 */
export function printPageHistory(history: Exclude<PageHistory, { kind: 'missing' }>): void {
  if (history.kind === 'redirected') {
    console.log(chalk.cyan(formatRedirectNotice(history.resolvedTo)));
  }

  for (const revision of history.revisions) {
    console.log(formatRevisionLine(revision));
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.error(chalk.blue('i'), message);
}

/**
 * Print debug message
 */
export function printDebug(message: string): void {
  console.error(chalk.dim(message));
}
