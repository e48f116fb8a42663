/**
 * go-vanity-html
 * Static go-import pages for vanity import paths
 */

export { readPackageIdentifiers, readLines } from './core/input/index.js';
export { GopathResolver, isLocalImport, isBuildableGoFile } from './core/packages/index.js';
export type { PackageInfo, PackageResolver, GopathResolverOptions } from './core/packages/index.js';
export { FsRepositoryDetector, findRepositoryRoot } from './core/vcs/index.js';
export type { RepositoryDetector, RepositoryRoot, VcsType } from './core/vcs/index.js';
export { PathRewriter } from './core/rewriting/index.js';
export type { RewriteRule } from './core/rewriting/index.js';
export {
  renderVanityPage,
  goImportContent,
  goSourceContent,
  escapeHtml,
} from './core/html/index.js';
export type { VanityRecord } from './core/html/index.js';
export {
  StreamOutputTarget,
  DirectoryOutputTarget,
  createOutputTarget,
} from './core/output/index.js';
export type { OutputHandle, OutputTarget } from './core/output/index.js';
export { generateVanityPages, generatePackagePage } from './core/orchestration/index.js';
export type {
  GenerationConfig,
  GenerationResult,
  GeneratedPage,
  GeneratorCallbacks,
} from './core/orchestration/index.js';
export {
  VanityError,
  PackageResolutionError,
  RepositoryDetectionError,
  RewriteConfigError,
  OutputError,
} from './utils/errors.js';
