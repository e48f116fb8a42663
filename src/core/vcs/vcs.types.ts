/**
 * Version Control Domain Types
 */

import type { VCS_MARKERS } from '../../utils/constants.js';

export type VcsType = (typeof VCS_MARKERS)[number]['type'];

/**
 * Reports whether a directory is the root of a checkout.
 * Resolves to the VCS kind, or null when the directory is not a repository;
 * rejects on any other failure.
 */
export interface RepositoryDetector {
  detect(directory: string): Promise<VcsType | null>;
}

/**
 * Where a package's repository starts
 */
export interface RepositoryRoot {
  /** Import path of the repository root */
  importPath: string;
  /** Directory the walk stopped at */
  directory: string;
  /** Detected VCS, null when the walk fell back to the source root */
  vcs: VcsType | null;
}
