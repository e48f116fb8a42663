/**
 * Vanity Page Generator
 *
 * Resolves, locates, rewrites, renders and writes one package at a time,
 * in input order. The first failure ends the run.
 */

import { findRepositoryRoot } from '../vcs/index.js';
import { renderVanityPage } from '../html/index.js';
import type { VanityRecord } from '../html/index.js';
import { createLogger } from '../../utils/logger.js';
import { formatError } from '../../utils/errors.js';
import type {
  GenerationConfig,
  GenerationResult,
  GeneratedPage,
  GeneratorCallbacks,
} from './orchestration.types.js';

const log = createLogger('generate');

/**
 * Generates and writes the page for a single identifier
 */
export async function generatePackagePage(
  identifier: string,
  config: GenerationConfig,
  callbacks?: GeneratorCallbacks
): Promise<GeneratedPage> {
  const pkg = await config.resolver.resolve(identifier);
  callbacks?.onPackageResolved?.(pkg);

  const root = await findRepositoryRoot(pkg, config.detector);

  const record: VanityRecord = {
    importPath: pkg.importPath,
    rootImportPath: root.importPath,
    repositoryHost: config.rewriter.rewrite(root.importPath),
  };
  log.debug(`${record.importPath}: root ${record.rootImportPath} -> ${record.repositoryHost}`);

  const html = renderVanityPage(record);

  const handle = await config.output.open(pkg.importPath);
  try {
    await handle.write(html);
  } catch (error) {
    // The write failure is the one reported
    await handle.close().catch((closeError: unknown) => {
      log.debug(`close after failed write: ${formatError(closeError)}`);
    });
    throw error;
  }
  await handle.close();

  return {
    importPath: record.importPath,
    rootImportPath: record.rootImportPath,
    repositoryHost: record.repositoryHost,
    vcs: root.vcs,
    outputPath: handle.path,
  };
}

/**
 * Generates pages for every identifier, sequentially
 */
export async function generateVanityPages(
  identifiers: AsyncIterable<string> | Iterable<string>,
  config: GenerationConfig,
  callbacks?: GeneratorCallbacks
): Promise<GenerationResult> {
  const pages: GeneratedPage[] = [];

  let index = 0;
  for await (const identifier of identifiers) {
    callbacks?.onPackageStart?.(identifier, index++);

    const page = await generatePackagePage(identifier, config, callbacks);
    pages.push(page);
    callbacks?.onPageWritten?.(page);
  }

  callbacks?.onComplete?.(pages);
  return { pages };
}
