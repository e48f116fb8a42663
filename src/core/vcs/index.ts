/**
 * Version Control Module
 * Repository detection and root location
 */

export { FsRepositoryDetector } from './detector.js';
export { findRepositoryRoot } from './locator.js';

export type { RepositoryDetector, RepositoryRoot, VcsType } from './vcs.types.js';
