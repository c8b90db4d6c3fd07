import chalk from 'chalk';
import { NovaError, OperationCancelledError } from '../models/errors.js';
import type { MarketplaceSource } from '../models/marketplace.js';
import { formatSource } from '../utils/source-parser.js';
import { isJsonMode, jsonOutput } from './json-output.js';

/** Conventional exit status for a process stopped by SIGINT */
export const EXIT_INTERRUPTED = 130;

export function exitCodeFor(error: Error): number {
  return error instanceof OperationCancelledError ? EXIT_INTERRUPTED : 1;
}

/**
 * Lines printed to stderr for a failed command: the message, then the hint.
 */
export function formatErrorLines(error: Error): string[] {
  const lines = [`${chalk.red('error:')} ${error.message}`];
  if (error instanceof NovaError && error.hint) {
    lines.push(`${chalk.yellow('hint:')} ${error.hint}`);
  }
  return lines;
}

/**
 * Report a failure (JSON envelope or human-readable) and exit.
 */
export function exitWithError(command: string, error: Error): never {
  if (isJsonMode()) {
    jsonOutput({
      success: false,
      command,
      error: error.message,
      ...(error instanceof NovaError && { code: error.code }),
      ...(error instanceof NovaError && error.hint !== undefined && { hint: error.hint }),
    });
  } else {
    for (const line of formatErrorLines(error)) {
      console.error(line);
    }
  }
  process.exit(exitCodeFor(error));
}

/**
 * Source as shown in listings: "github acme/bundles", "local /srv/bundles"
 */
export function describeSource(source: MarketplaceSource): string {
  return `${source.type} ${formatSource(source)}`;
}
