/**
 * Packages Module
 * Resolution of package identifiers to directories
 */

export {
  GopathResolver,
  isLocalImport,
  isBuildableGoFile,
  subdirectory,
  toImportPath,
} from './resolver.js';

export type {
  PackageInfo,
  PackageResolver,
  GopathResolverOptions,
  Workspace,
} from './packages.types.js';
