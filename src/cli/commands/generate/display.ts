/**
 * Display Functions
 * Handles UI output for the generate command (stderr only)
 */

import chalk from 'chalk';
import { CLI_CONSTANTS } from '../../utils.js';
import type { GeneratedPage } from '../../../core/orchestration/index.js';

/**
 * One line per generated page
 */
export function displayPages(pages: GeneratedPage[]): void {
  console.error(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  for (const page of pages) {
    const vcs = page.vcs ? chalk.gray(` (${page.vcs})`) : chalk.yellow(' (no repository found)');
    console.error(
      chalk.cyan(page.importPath) + chalk.gray(' → ') + chalk.white(page.repositoryHost) + vcs
    );
  }
  console.error(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
}

/**
 * Final summary for directory output
 */
export function displaySummary(pages: GeneratedPage[], outputDir: string): void {
  console.error(chalk.green(`✅ Wrote ${pages.length} page(s) to ${outputDir}`));
}

/**
 * One-line fatal error message
 */
export function displayError(message: string): void {
  console.error(chalk.red(message));
}
