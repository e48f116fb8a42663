/**
 * GOPATH Package Resolver
 *
 * Resolves import paths and local directories the way `go/build` does in
 * GOPATH mode: GOROOT first, then every GOPATH entry, each with its own
 * `src` tree.
 */

import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'path';
import { PackageResolutionError, errorCode } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { GO_FILE_EXTENSION, GO_TEST_FILE_SUFFIX, SOURCE_DIR } from '../../utils/constants.js';
import type {
  GopathResolverOptions,
  PackageInfo,
  PackageResolver,
  Workspace,
} from './packages.types.js';

const log = createLogger('packages');

/**
 * Whether an identifier names a directory relative to the working directory
 */
export function isLocalImport(identifier: string): boolean {
  return (
    identifier === '.' ||
    identifier === '..' ||
    identifier.startsWith('./') ||
    identifier.startsWith('../')
  );
}

/**
 * Converts a platform path to a slash-separated import path
 */
export function toImportPath(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Returns the slash-separated path of `dir` below `parent`, or null when
 * `dir` is not inside it
 */
export function subdirectory(parent: string, dir: string): string | null {
  const rel = relative(parent, dir);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }
  return toImportPath(rel);
}

/**
 * Whether a file takes part in a package build
 */
export function isBuildableGoFile(name: string): boolean {
  return (
    name.endsWith(GO_FILE_EXTENSION) &&
    !name.endsWith(GO_TEST_FILE_SUFFIX) &&
    !name.startsWith('_') &&
    !name.startsWith('.')
  );
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}

export class GopathResolver implements PackageResolver {
  private readonly workspaces: Workspace[];
  private readonly cwd: string;

  constructor(options: GopathResolverOptions) {
    this.cwd = options.cwd;
    this.workspaces = [];

    if (options.goroot) {
      this.workspaces.push({ root: resolve(options.goroot), origin: '$GOROOT' });
    }
    for (const entry of options.gopath) {
      if (entry) {
        this.workspaces.push({ root: resolve(entry), origin: '$GOPATH' });
      }
    }
  }

  async resolve(identifier: string): Promise<PackageInfo> {
    if (identifier === '') {
      throw new PackageResolutionError(identifier, 'import "": invalid import path');
    }
    if (isAbsolute(identifier)) {
      throw new PackageResolutionError(
        identifier,
        `import "${identifier}": cannot import absolute path`
      );
    }

    const pkg = isLocalImport(identifier)
      ? this.resolveLocal(identifier)
      : await this.resolveImportPath(identifier);

    await this.ensureBuildable(identifier, pkg.directory);
    log.debug(`${identifier} -> ${pkg.importPath} (${pkg.directory})`);
    return pkg;
  }

  private resolveLocal(identifier: string): PackageInfo {
    const directory = resolve(this.cwd, identifier);

    for (const workspace of this.workspaces) {
      const sourceRoot = join(workspace.root, SOURCE_DIR);
      const importPath = subdirectory(sourceRoot, directory);
      if (importPath !== null) {
        return this.packageInfo(workspace, importPath, directory);
      }
    }

    throw new PackageResolutionError(
      identifier,
      `import "${identifier}": directory ${directory} is outside any source root`
    );
  }

  private async resolveImportPath(importPath: string): Promise<PackageInfo> {
    const tried: string[] = [];

    for (const workspace of this.workspaces) {
      const directory = join(workspace.root, SOURCE_DIR, importPath);
      if (await isDirectory(directory)) {
        return this.packageInfo(workspace, importPath, directory);
      }
      tried.push(`${directory} (from ${workspace.origin})`);
    }

    const searched = tried.length > 0 ? tried.join(', ') : 'no workspaces ($GOPATH not set)';
    throw new PackageResolutionError(
      importPath,
      `cannot find package "${importPath}" in any of: ${searched}`
    );
  }

  private packageInfo(workspace: Workspace, importPath: string, directory: string): PackageInfo {
    return {
      importPath,
      directory,
      sourceRoot: join(workspace.root, SOURCE_DIR),
      root: workspace.root,
      goroot: workspace.origin === '$GOROOT',
    };
  }

  private async ensureBuildable(identifier: string, directory: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new PackageResolutionError(
          identifier,
          `cannot find package "${identifier}" in: ${directory}`
        );
      }
      throw error;
    }

    const buildable = entries.some((entry) => entry.isFile() && isBuildableGoFile(entry.name));
    if (!buildable) {
      throw new PackageResolutionError(identifier, `no buildable Go source files in ${directory}`);
    }
  }
}
