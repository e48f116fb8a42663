/**
 * Generate Command
 * Writes vanity pages for the packages named on the command line or stdin
 */

import { resolve } from 'path';
import type { Readable, Writable } from 'stream';
import type { Command } from 'commander';
import { config as envConfig } from '../../../config.js';
import { readPackageIdentifiers } from '../../../core/input/index.js';
import { GopathResolver } from '../../../core/packages/index.js';
import { FsRepositoryDetector } from '../../../core/vcs/index.js';
import { PathRewriter } from '../../../core/rewriting/index.js';
import { createOutputTarget } from '../../../core/output/index.js';
import { generateVanityPages } from '../../../core/orchestration/index.js';
import type { GenerationResult } from '../../../core/orchestration/index.js';
import { formatError } from '../../../utils/errors.js';
import { debug, setDebugMode } from '../../../utils/logger.js';
import { displayError, displayPages, displaySummary } from './display.js';
import { GenerationProgressHandler } from './progress.js';

export interface GenerateOptions {
  replace: string;
  output: string;
  debug: boolean;
}

/**
 * Process environment the command runs against
 */
export interface GenerateEnvironment {
  stdin: Readable;
  stdout: Writable;
  cwd: string;
  gopath: readonly string[];
  goroot?: string;
}

/**
 * Runs a generation. Throws on the first failure.
 */
export async function runGenerate(
  packages: readonly string[],
  options: GenerateOptions,
  env: GenerateEnvironment
): Promise<GenerationResult> {
  // Parsed before any input is read so a bad option fails fast
  const rewriter = PathRewriter.parse(options.replace);
  const outputDir = options.output ? resolve(env.cwd, options.output) : undefined;

  debug(`GOPATH: ${env.gopath.join(', ')}`);
  debug(`GOROOT: ${env.goroot ?? '(unset)'}`);
  debug(`Output: ${outputDir ?? 'stdout'}`);

  const generationConfig = {
    resolver: new GopathResolver({ gopath: env.gopath, goroot: env.goroot, cwd: env.cwd }),
    detector: new FsRepositoryDetector(),
    rewriter,
    output: createOutputTarget(outputDir, env.stdout),
  };
  const identifiers = readPackageIdentifiers(packages, env.stdin);

  if (!outputDir) {
    return generateVanityPages(identifiers, generationConfig);
  }

  const progress = new GenerationProgressHandler();
  try {
    const result = await generateVanityPages(
      identifiers,
      generationConfig,
      progress.getCallbacks()
    );
    if (options.debug) {
      displayPages(result.pages);
    }
    displaySummary(result.pages, outputDir);
    return result;
  } catch (error) {
    progress.stop();
    throw error;
  }
}

/**
 * Register the generate action with the CLI program
 */
export function registerGenerateCommand(program: Command): void {
  program
    .argument('[packages...]', 'package import paths or ./relative directories (default: stdin)')
    .option(
      '-r, --replace <pairs>',
      'a comma-separated list of canonical=noncanonical pairs of package paths',
      envConfig.replace
    )
    .option(
      '-o, --output <directory>',
      'base directory where HTML files should be created (default: stdout)',
      envConfig.outputDir
    )
    .option('--debug', 'Enable debug logging on stderr', envConfig.debug)
    .option('--no-debug', 'Disable debug logging, overriding VANITY_DEBUG')
    .action(async (packages: string[], options: GenerateOptions) => {
      try {
        if (options.debug) {
          setDebugMode(true);
        }

        await runGenerate(packages, options, {
          stdin: process.stdin,
          stdout: process.stdout,
          cwd: process.cwd(),
          gopath: envConfig.gopath,
          goroot: envConfig.goroot,
        });
      } catch (error) {
        displayError(formatError(error));
        process.exit(1);
      }
    });
}
