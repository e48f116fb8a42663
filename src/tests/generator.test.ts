import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { readFile, rm } from 'fs/promises';
import { join } from 'path';
import { PassThrough, Readable } from 'stream';
import { generateVanityPages } from '../core/orchestration/index.js';
import type { GenerationConfig } from '../core/orchestration/index.js';
import type { PackageInfo, PackageResolver } from '../core/packages/index.js';
import type { RepositoryDetector, VcsType } from '../core/vcs/index.js';
import { PathRewriter } from '../core/rewriting/index.js';
import { StreamOutputTarget } from '../core/output/index.js';
import type { OutputTarget } from '../core/output/index.js';
import { renderVanityPage } from '../core/html/index.js';
import { runGenerate } from '../cli/commands/generate/index.js';
import { OutputError, PackageResolutionError, RewriteConfigError } from '../utils/errors.js';
import { createGitRepository, createGoPackage, createTempTestDir } from './helpers.js';

const SOURCE_ROOT = join('/', 'ws', 'src');

class FakeResolver implements PackageResolver {
  async resolve(identifier: string): Promise<PackageInfo> {
    if (identifier === '' || identifier.startsWith('missing')) {
      throw new PackageResolutionError(identifier, `cannot find package "${identifier}"`);
    }
    return {
      importPath: identifier,
      directory: join(SOURCE_ROOT, ...identifier.split('/')),
      sourceRoot: SOURCE_ROOT,
      root: join('/', 'ws'),
      goroot: false,
    };
  }
}

/**
 * Every directory two levels below the source root is a repository
 */
class DepthDetector implements RepositoryDetector {
  async detect(directory: string): Promise<VcsType | null> {
    const depth = directory.slice(SOURCE_ROOT.length + 1).split('/').length;
    return depth === 2 ? 'git' : null;
  }
}

function collect(stream: PassThrough): () => string {
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString('utf-8');
}

describe('Vanity Page Generator', () => {
  function makeConfig(stream: PassThrough, replace = 'example.com=github.com/bar'): GenerationConfig {
    return {
      resolver: new FakeResolver(),
      detector: new DepthDetector(),
      rewriter: PathRewriter.parse(replace),
      output: new StreamOutputTarget(stream),
    };
  }

  it('should concatenate pages in input order', async () => {
    const stream = new PassThrough();
    const read = collect(stream);

    const result = await generateVanityPages(
      ['example.com/foo', 'example.com/foo/sub'],
      makeConfig(stream)
    );

    const expected =
      renderVanityPage({
        importPath: 'example.com/foo',
        rootImportPath: 'example.com/foo',
        repositoryHost: 'github.com/bar/foo',
      }) +
      renderVanityPage({
        importPath: 'example.com/foo/sub',
        rootImportPath: 'example.com/foo',
        repositoryHost: 'github.com/bar/foo',
      });
    assert.strictEqual(read(), expected);
    assert.deepStrictEqual(
      result.pages.map((page) => page.importPath),
      ['example.com/foo', 'example.com/foo/sub']
    );
    assert.strictEqual(result.pages[1].rootImportPath, 'example.com/foo');
    assert.strictEqual(result.pages[1].outputPath, null);
  });

  it('should report progress through callbacks', async () => {
    const events: string[] = [];

    await generateVanityPages(['example.com/foo'], makeConfig(new PassThrough()), {
      onPackageStart: (identifier, index) => events.push(`start ${index} ${identifier}`),
      onPackageResolved: (pkg) => events.push(`resolved ${pkg.directory}`),
      onPageWritten: (page) => events.push(`written ${page.repositoryHost} ${page.vcs}`),
      onComplete: (pages) => events.push(`complete ${pages.length}`),
    });

    assert.deepStrictEqual(events, [
      'start 0 example.com/foo',
      `resolved ${join(SOURCE_ROOT, 'example.com', 'foo')}`,
      'written github.com/bar/foo git',
      'complete 1',
    ]);
  });

  it('should stop at the first failure', async () => {
    const stream = new PassThrough();
    const read = collect(stream);
    const started: string[] = [];

    await assert.rejects(
      generateVanityPages(
        ['example.com/foo', 'missing/pkg', 'example.com/bar'],
        makeConfig(stream),
        { onPackageStart: (identifier) => started.push(identifier) }
      ),
      PackageResolutionError
    );

    assert.deepStrictEqual(started, ['example.com/foo', 'missing/pkg']);
    assert.ok(read().includes('example.com/foo git https://github.com/bar/foo.git'));
  });

  it('should report the write error when closing also fails', async () => {
    const closed: string[] = [];
    const output: OutputTarget = {
      open: async (importPath) => ({
        path: null,
        write: async () => {
          throw new OutputError('disk full');
        },
        close: async () => {
          closed.push(importPath);
          throw new OutputError('close failed');
        },
      }),
    };

    await assert.rejects(
      generateVanityPages(['example.com/foo'], { ...makeConfig(new PassThrough()), output }),
      (error: unknown) => error instanceof OutputError && error.message === 'disk full'
    );
    assert.deepStrictEqual(closed, ['example.com/foo']);
  });

  it('should treat a blank line as an unresolvable package', async () => {
    await assert.rejects(
      generateVanityPages(['', 'example.com/foo'], makeConfig(new PassThrough())),
      PackageResolutionError
    );
  });
});

describe('runGenerate', () => {
  let testDir: string;
  let gopath: string;

  beforeEach(async () => {
    testDir = await createTempTestDir('generate');
    gopath = join(testDir, 'gopath');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function environment(stdin: Readable, stdout: PassThrough) {
    return { stdin, stdout, cwd: testDir, gopath: [gopath] };
  }

  it('should write one index.html per package under the output directory', async () => {
    const repo = await createGoPackage(gopath, 'example.com/foo');
    await createGitRepository(repo);
    await createGoPackage(gopath, 'example.com/foo/sub');
    await createGoPackage(gopath, 'example.com/loose');

    const result = await runGenerate(
      ['example.com/foo', 'example.com/foo/sub', 'example.com/loose'],
      { replace: 'example.com=github.com/bar', output: 'out', debug: false },
      environment(Readable.from([]), new PassThrough())
    );

    const out = join(testDir, 'out');
    assert.deepStrictEqual(
      result.pages.map((page) => page.outputPath),
      [
        join(out, 'example.com', 'foo', 'index.html'),
        join(out, 'example.com', 'foo', 'sub', 'index.html'),
        join(out, 'example.com', 'loose', 'index.html'),
      ]
    );

    const foo = await readFile(join(out, 'example.com', 'foo', 'index.html'), 'utf-8');
    assert.ok(foo.includes('example.com/foo'));
    assert.ok(foo.includes('github.com/bar'));
    assert.ok(
      foo.includes(
        '<meta name="go-import" content="example.com/foo git https://github.com/bar/foo.git">'
      )
    );

    const sub = await readFile(join(out, 'example.com', 'foo', 'sub', 'index.html'), 'utf-8');
    assert.ok(
      sub.includes(
        '<meta name="go-import" content="example.com/foo git https://github.com/bar/foo.git">'
      )
    );

    assert.strictEqual(result.pages[2].vcs, null);
    assert.strictEqual(result.pages[2].repositoryHost, 'github.com/bar/loose');
  });

  it('should stream pages read from stdin to stdout', async () => {
    await createGoPackage(gopath, 'example.com/a');
    await createGoPackage(gopath, 'example.com/b');
    const stdout = new PassThrough();
    const read = collect(stdout);

    await runGenerate(
      [],
      { replace: '', output: '', debug: false },
      environment(Readable.from(['example.com/a\nexample.com/b\n']), stdout)
    );

    const expected =
      renderVanityPage({
        importPath: 'example.com/a',
        rootImportPath: 'example.com/a',
        repositoryHost: 'example.com/a',
      }) +
      renderVanityPage({
        importPath: 'example.com/b',
        rootImportPath: 'example.com/b',
        repositoryHost: 'example.com/b',
      });
    assert.strictEqual(read(), expected);
  });

  it('should reject a malformed -replace before reading packages', async () => {
    await assert.rejects(
      runGenerate(
        ['example.com/never-resolved'],
        { replace: 'example.com', output: '', debug: false },
        environment(Readable.from([]), new PassThrough())
      ),
      RewriteConfigError
    );
  });

  it('should fail on an unknown package', async () => {
    await assert.rejects(
      runGenerate(
        ['example.com/missing'],
        { replace: '', output: 'out', debug: false },
        environment(Readable.from([]), new PassThrough())
      ),
      PackageResolutionError
    );
  });
});
