/**
 * Progress Indicators for CLI
 *
 * Spinners write to stderr and stay silent under --json so stdout carries
 * only the JSON document.
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";

/**
 * Start a spinner for a long-running step
 *
 * @param silent - Suppress all spinner output (JSON mode)
 */
export function startSpinner(text: string, silent: boolean = false): Ora {
  return ora({ text, color: "cyan", isSilent: silent }).start();
}

export function createAskSpinner(question: string, silent: boolean): Ora {
  return startSpinner(`Answering ${chalk.cyan(question.length > 60 ? question.slice(0, 57) + "..." : question)}`, silent);
}

/**
 * Stop a spinner, marking success or failure
 */
export function completeSpinner(spinner: Ora, success: boolean, message: string): void {
  if (success) {
    spinner.succeed(chalk.green(message));
  } else {
    spinner.fail(chalk.red(message));
  }
}
