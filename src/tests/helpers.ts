/**
 * Shared fixtures for filesystem tests
 */

import { mkdir, mkdtemp, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';

/**
 * Create a temporary test directory
 */
export async function createTempTestDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `go-vanity-html-${prefix}-`));
}

/**
 * Create a test file, with its parent directories
 */
export async function createTestFile(dir: string, path: string, content: string): Promise<void> {
  const fullPath = join(dir, path);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content, 'utf-8');
}

/**
 * Create a Go package with one source file below `<gopath>/src`
 */
export async function createGoPackage(gopath: string, importPath: string): Promise<string> {
  const dir = join(gopath, 'src', ...importPath.split('/'));
  const name = importPath.split('/').pop() ?? 'main';
  await createTestFile(dir, `${name}.go`, `package ${name}\n`);
  return dir;
}

/**
 * Mark a directory as a git checkout
 */
export async function createGitRepository(dir: string): Promise<void> {
  await mkdir(join(dir, '.git'), { recursive: true });
}
