/**
 * Repository Root Locator
 */

import { dirname, relative } from 'path';
import { subdirectory, toImportPath } from '../packages/resolver.js';
import type { PackageInfo } from '../packages/index.js';
import { VanityError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { RepositoryDetector, RepositoryRoot, VcsType } from './vcs.types.js';

const log = createLogger('vcs');

/**
 * Walks from the package directory up to (not into) the source root and
 * stops at the first repository. Without one, the source root is the
 * boundary and the package's own import path is returned.
 */
export async function findRepositoryRoot(
  pkg: PackageInfo,
  detector: RepositoryDetector
): Promise<RepositoryRoot> {
  if (pkg.directory !== pkg.sourceRoot && subdirectory(pkg.sourceRoot, pkg.directory) === null) {
    throw new VanityError(
      `package directory ${pkg.directory} is not inside source root ${pkg.sourceRoot}`
    );
  }

  let dir = pkg.directory;
  let vcs: VcsType | null = null;

  while (dir !== pkg.sourceRoot) {
    vcs = await detector.detect(dir);
    if (vcs !== null) {
      log.debug(`found ${vcs} repository at ${dir}`);
      break;
    }
    dir = dirname(dir);
  }

  const rel = relative(pkg.sourceRoot, dir);
  if (rel === '' || rel === '.') {
    log.debug(`no repository above ${pkg.directory}, using ${pkg.importPath}`);
    return { importPath: pkg.importPath, directory: dir, vcs };
  }

  return { importPath: toImportPath(rel), directory: dir, vcs };
}
