import chalk from 'chalk';

export function formatWarning(text: string): string {
  return chalk.black.bgYellow(`WARNING: ${text}`);
}

export function formatError(text: string): string {
  return chalk.white.bgRed(`ERROR: ${text}`);
}

/**
 * Print an error (red) or, with `warningOnly`, a warning (yellow).
 */
export function printErrorOrWarning(text: string, warningOnly = false): void {
  if (warningOnly) {
    console.log(formatWarning(text));
  } else {
    console.error(formatError(text));
  }
}
