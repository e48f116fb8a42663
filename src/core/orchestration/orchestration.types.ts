/**
 * Orchestration Domain Types
 */

import type { PackageInfo, PackageResolver } from '../packages/index.js';
import type { RepositoryDetector, VcsType } from '../vcs/index.js';
import type { PathRewriter } from '../rewriting/index.js';
import type { OutputTarget } from '../output/index.js';

/**
 * Collaborators for a generation run
 */
export interface GenerationConfig {
  resolver: PackageResolver;
  detector: RepositoryDetector;
  /** Built once at startup and shared by every package */
  rewriter: PathRewriter;
  output: OutputTarget;
}

/**
 * A page that has been written
 */
export interface GeneratedPage {
  importPath: string;
  /** Import path of the repository root */
  rootImportPath: string;
  /** Rewritten repository location */
  repositoryHost: string;
  /** Detected VCS, null when no repository was found below the source root */
  vcs: VcsType | null;
  /** File written, or null when written to a stream */
  outputPath: string | null;
}

export interface GenerationResult {
  pages: GeneratedPage[];
}

/**
 * Callbacks for generator progress updates
 */
export interface GeneratorCallbacks {
  onPackageStart?: (identifier: string, index: number) => void;
  onPackageResolved?: (pkg: PackageInfo) => void;
  onPageWritten?: (page: GeneratedPage) => void;
  onComplete?: (pages: GeneratedPage[]) => void;
}
