/**
 * Output Writers
 * Page destinations: a shared stream, or one index.html per import path
 */

import { mkdir, open } from 'fs/promises';
import { join } from 'path';
import type { Writable } from 'stream';
import { INDEX_HTML, OUTPUT_DIR_MODE } from '../../utils/constants.js';
import { OutputError, formatError } from '../../utils/errors.js';
import type { OutputHandle, OutputTarget } from './output.types.js';

/**
 * Appends every page to the same stream, with no separator. Closing a
 * handle leaves the stream open for the next page.
 */
export class StreamOutputTarget implements OutputTarget {
  constructor(private readonly stream: Writable) {}

  async open(_importPath: string): Promise<OutputHandle> {
    const stream = this.stream;
    return {
      path: null,
      write: (content: string) =>
        new Promise<void>((resolve, reject) => {
          stream.write(content, 'utf-8', (error) => {
            if (error) {
              reject(new OutputError(`cannot write output: ${formatError(error)}`, { cause: error }));
            } else {
              resolve();
            }
          });
        }),
      close: async () => {},
    };
  }
}

/**
 * Writes `<baseDir>/<importPath>/index.html`, creating directories as needed
 */
export class DirectoryOutputTarget implements OutputTarget {
  constructor(private readonly baseDir: string) {}

  /**
   * Path of the page for an import path
   */
  pathFor(importPath: string): string {
    return join(this.baseDir, importPath, INDEX_HTML);
  }

  async open(importPath: string): Promise<OutputHandle> {
    const dir = join(this.baseDir, importPath);
    const path = this.pathFor(importPath);

    try {
      await mkdir(dir, { recursive: true, mode: OUTPUT_DIR_MODE });
    } catch (error) {
      throw new OutputError(`cannot create directory ${dir}: ${formatError(error)}`, {
        cause: error,
      });
    }

    const file = await open(path, 'w').catch((error: unknown) => {
      throw new OutputError(`cannot create ${path}: ${formatError(error)}`, { cause: error });
    });

    return {
      path,
      write: async (content: string) => {
        try {
          await file.writeFile(content, 'utf-8');
        } catch (error) {
          throw new OutputError(`cannot write ${path}: ${formatError(error)}`, { cause: error });
        }
      },
      close: async () => {
        try {
          await file.close();
        } catch (error) {
          throw new OutputError(`cannot close ${path}: ${formatError(error)}`, { cause: error });
        }
      },
    };
  }
}

/**
 * Stream output when no base directory is configured
 */
export function createOutputTarget(outputDir: string | undefined, stdout: Writable): OutputTarget {
  return outputDir ? new DirectoryOutputTarget(outputDir) : new StreamOutputTarget(stdout);
}
