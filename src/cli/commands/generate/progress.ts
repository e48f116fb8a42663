/**
 * Progress Tracking
 * Spinner state for page generation
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { GeneratedPage, GeneratorCallbacks } from '../../../core/orchestration/index.js';
import type { PackageInfo } from '../../../core/packages/index.js';

/**
 * Generation progress handler with a stateful spinner
 */
export class GenerationProgressHandler {
  private spinner: Ora;
  private written: number = 0;

  constructor() {
    this.spinner = ora({ text: 'Reading packages...', color: 'cyan' }).start();
  }

  /**
   * Get callbacks object for generateVanityPages
   */
  public getCallbacks(): GeneratorCallbacks {
    return {
      onPackageStart: this.onPackageStart.bind(this),
      onPackageResolved: this.onPackageResolved.bind(this),
      onPageWritten: this.onPageWritten.bind(this),
      onComplete: this.onComplete.bind(this),
    };
  }

  private onPackageStart(identifier: string): void {
    this.spinner.text = `Resolving ${identifier}...`;
  }

  private onPackageResolved(pkg: PackageInfo): void {
    this.spinner.text = `Locating repository for ${pkg.importPath}...`;
  }

  private onPageWritten(page: GeneratedPage): void {
    this.written++;
    this.spinner.text = chalk.gray(`${this.written} written, last ${page.importPath}`);
  }

  private onComplete(pages: GeneratedPage[]): void {
    this.spinner.succeed(chalk.green(`Generated ${pages.length} page(s)`));
  }

  /**
   * Clear the spinner after a failure; the caller reports the error
   */
  public stop(): void {
    this.spinner.stop();
  }
}
