/**
 * Filesystem Repository Detector
 * Looks for VCS metadata entries in a directory
 */

import { stat } from 'fs/promises';
import { join } from 'path';
import { VCS_MARKERS } from '../../utils/constants.js';
import { RepositoryDetectionError, errorCode } from '../../utils/errors.js';
import type { RepositoryDetector, VcsType } from './vcs.types.js';

async function hasEntry(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}

/**
 * `.git` may be a file (worktrees, submodules), so any entry counts.
 */
export class FsRepositoryDetector implements RepositoryDetector {
  async detect(directory: string): Promise<VcsType | null> {
    for (const { type, marker } of VCS_MARKERS) {
      let found: boolean;
      try {
        found = await hasEntry(join(directory, marker));
      } catch (error) {
        throw new RepositoryDetectionError(directory, error);
      }
      if (found) {
        return type;
      }
    }
    return null;
  }
}
