import { Test } from '@nestjs/testing';
import { ConsoleLogger } from '@nestjs/common';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { access, mkdtemp, readFile, stat } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ArchiveStagerService,
  toStagingError,
} from './archive-stager.service.js';
import {
  ArchiveTooLargeError,
  PathTraversalError,
  ValidationError,
} from './review.errors.js';
import type { StagedProject } from './review.types.js';
import { DEFAULT_CONFIG } from '../constants.js';
import { buildZip } from '../testing/zip-fixture.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, mkdtemp: vi.fn(actual.mkdtemp) };
});

/** Staging roots created since the last `mockClear`. */
async function createdRoots(): Promise<string[]> {
  const results = vi.mocked(mkdtemp).mock.results;
  return Promise.all(results.map(async (result) => String(await result.value)));
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('ArchiveStagerService', () => {
  let service: ArchiveStagerService;
  const limits = DEFAULT_CONFIG.limits;

  beforeEach(async () => {
    vi.mocked(mkdtemp).mockClear();
    const module = await Test.createTestingModule({
      providers: [
        ArchiveStagerService,
        { provide: ConsoleLogger, useValue: new ConsoleLogger() },
      ],
    }).compile();
    service = module.get(ArchiveStagerService);
  });

  it('should extract files and list them sorted by path', async () => {
    const archive = buildZip([
      { name: 'src/', isDirectory: true },
      { name: 'src/main.py', content: 'print("hi")\n' },
      { name: 'README.md', content: '# Demo\n' },
    ]);
    let staged: StagedProject | undefined;
    const content = await service.withStagedProject(
      archive,
      limits,
      async (project) => {
        staged = project;
        return readFile(join(project.root, 'src', 'main.py'), 'utf-8');
      },
    );
    expect(content).toBe('print("hi")\n');
    expect(staged?.entries).toEqual([
      { path: 'README.md', size: 7 },
      { path: 'src/main.py', size: 12 },
    ]);
  });

  it('should remove the staging directory after the callback', async () => {
    let root = '';
    await service.withStagedProject(
      buildZip([{ name: 'a.txt', content: 'a' }]),
      limits,
      async (project) => {
        root = project.root;
        expect(await exists(join(root, 'a.txt'))).toBe(true);
      },
    );
    expect(root.startsWith(join(tmpdir(), 'autoreview-'))).toBe(true);
    expect(await exists(root)).toBe(false);
  });

  it('should remove the staging directory when the callback throws', async () => {
    let root = '';
    await expect(
      service.withStagedProject(
        buildZip([{ name: 'a.txt', content: 'a' }]),
        limits,
        async (project) => {
          root = project.root;
          throw new Error('boom');
        },
      ),
    ).rejects.toThrow('boom');
    expect(await exists(root)).toBe(false);
  });

  it('should create empty directories without listing them', async () => {
    const archive = buildZip([{ name: 'empty/', isDirectory: true }]);
    await service.withStagedProject(archive, limits, async (project) => {
      expect(project.entries).toEqual([]);
      expect((await stat(join(project.root, 'empty'))).isDirectory()).toBe(true);
    });
  });

  it('should stage an empty archive', async () => {
    const entries = await service.withStagedProject(
      buildZip([]),
      limits,
      async (project) => project.entries,
    );
    expect(entries).toEqual([]);
  });

  it('should keep names that only start with two dots', async () => {
    const archive = buildZip([
      { name: 'main.py', content: 'x = 1\n' },
      { name: '..env.example', content: 'KEY=\n' },
    ]);
    const paths = await service.withStagedProject(archive, limits, async (project) => {
      expect(await readFile(join(project.root, '..env.example'), 'utf-8')).toBe('KEY=\n');
      return project.entries.map((entry) => entry.path);
    });
    expect(paths).toEqual(['..env.example', 'main.py']);
  });

  it('should normalize backslash separators', async () => {
    const archive = buildZip([{ name: 'src\\app.py', content: 'x = 1\n' }]);
    const entries = await service.withStagedProject(
      archive,
      limits,
      async (project) => project.entries,
    );
    expect(entries).toEqual([{ path: 'src/app.py', size: 6 }]);
  });

  it('should reject entries escaping the root and write nothing outside', async () => {
    const escapeName = `autoreview-escape-${randomUUID()}.txt`;
    const archive = buildZip([
      { name: 'ok.txt', content: 'fine' },
      { name: `../${escapeName}`, content: 'owned' },
    ]);
    const called: string[] = [];
    const error = await service
      .withStagedProject(archive, limits, async () => {
        called.push('fn');
      })
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PathTraversalError);
    expect(error).toMatchObject({ statusCode: 400, code: 'PATH_TRAVERSAL' });
    expect(called).toEqual([]);
    expect(await exists(join(tmpdir(), escapeName))).toBe(false);
  });

  it('should reject a deep relative escape', async () => {
    const archive = buildZip([{ name: '../../etc/passwd', content: 'root:x' }]);
    await expect(
      service.withStagedProject(archive, limits, async () => undefined),
    ).rejects.toBeInstanceOf(PathTraversalError);
  });

  it('should reject absolute entry names', async () => {
    const archive = buildZip([{ name: '/tmp/evil.txt', content: 'x' }]);
    await expect(
      service.withStagedProject(archive, limits, async () => undefined),
    ).rejects.toBeInstanceOf(PathTraversalError);
  });

  it('should reject archives with too many entries', async () => {
    const archive = buildZip([
      { name: 'a.txt', content: 'a' },
      { name: 'b.txt', content: 'b' },
      { name: 'c.txt', content: 'c' },
    ]);
    await expect(
      service.withStagedProject(
        archive,
        { ...limits, maxArchiveEntries: 2 },
        async () => undefined,
      ),
    ).rejects.toThrow('Archive has 3 entries, limit is 2');
  });

  it('should reject an entry above the per-entry limit', async () => {
    const archive = buildZip([{ name: 'big.txt', content: 'x'.repeat(20) }]);
    const error = await service
      .withStagedProject(archive, { ...limits, maxEntryBytes: 10 }, async () => undefined)
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ArchiveTooLargeError);
    expect(error).toMatchObject({
      statusCode: 413,
      message: 'Entry "big.txt" is 20 bytes, limit is 10',
    });
  });

  it('should reject archives whose total size exceeds the limit', async () => {
    const archive = buildZip([
      { name: 'a.txt', content: 'x'.repeat(8) },
      { name: 'b.txt', content: 'x'.repeat(8) },
    ]);
    await expect(
      service.withStagedProject(
        archive,
        { ...limits, maxExtractedBytes: 12 },
        async () => undefined,
      ),
    ).rejects.toThrow('Archive expands beyond 12 bytes');
  });

  it('should skip symlink entries', async () => {
    const archive = buildZip([
      { name: 'link', content: '/etc/passwd', isSymlink: true },
      { name: 'main.py', content: 'x = 1\n' },
    ]);
    await service.withStagedProject(archive, limits, async (project) => {
      expect(project.entries).toEqual([{ path: 'main.py', size: 6 }]);
      expect(await exists(join(project.root, 'link'))).toBe(false);
    });
  });

  it('should reject a corrupt archive as invalid', async () => {
    const corrupt = Buffer.concat([
      Buffer.from([0x50, 0x4b, 0x03, 0x04]),
      Buffer.from('definitely not a zip'),
    ]);
    const error = await service
      .withStagedProject(corrupt, limits, async () => undefined)
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: 'INVALID_ARCHIVE', part: 'project_zip' });
  });
});

describe('ArchiveStagerService cleanup on rejected archives', () => {
  let service: ArchiveStagerService;
  const limits = DEFAULT_CONFIG.limits;

  beforeEach(async () => {
    vi.mocked(mkdtemp).mockClear();
    const module = await Test.createTestingModule({
      providers: [
        ArchiveStagerService,
        { provide: ConsoleLogger, useValue: new ConsoleLogger() },
      ],
    }).compile();
    service = module.get(ArchiveStagerService);
  });

  const cases: { name: string; archive: Buffer; limits?: Partial<typeof limits> }[] = [
    {
      name: 'path traversal',
      archive: buildZip([
        { name: 'ok.txt', content: 'fine' },
        { name: '../../etc/passwd', content: 'root:x' },
      ]),
    },
    {
      name: 'too many entries',
      archive: buildZip([
        { name: 'a.txt', content: 'a' },
        { name: 'b.txt', content: 'b' },
      ]),
      limits: { maxArchiveEntries: 1 },
    },
    {
      name: 'an oversized entry',
      archive: buildZip([{ name: 'big.txt', content: 'x'.repeat(20) }]),
      limits: { maxEntryBytes: 10 },
    },
    {
      name: 'an oversized total',
      archive: buildZip([
        { name: 'a.txt', content: 'x'.repeat(8) },
        { name: 'b.txt', content: 'x'.repeat(8) },
      ]),
      limits: { maxExtractedBytes: 12 },
    },
    {
      name: 'a corrupt archive',
      archive: Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.from('garbage')]),
    },
  ];

  for (const testCase of cases) {
    it(`should remove the staging directory after ${testCase.name}`, async () => {
      const callback = vi.fn();
      await expect(
        service.withStagedProject(
          testCase.archive,
          { ...limits, ...testCase.limits },
          callback,
        ),
      ).rejects.toBeInstanceOf(Error);

      const roots = await createdRoots();
      expect(roots).toHaveLength(1);
      expect(roots[0].startsWith(join(tmpdir(), 'autoreview-'))).toBe(true);
      expect(await exists(roots[0])).toBe(false);
      expect(callback).not.toHaveBeenCalled();
    });
  }
});

describe('toStagingError', () => {
  it('should map unsafe-name messages to PathTraversalError', () => {
    const mapped = toStagingError(new Error('invalid relative path: ../x'));
    expect(mapped).toBeInstanceOf(PathTraversalError);
    expect(mapped).toMatchObject({ entryName: '../x' });
  });

  it('should map oversized streams to ArchiveTooLargeError', () => {
    expect(
      toStagingError(
        new Error('too many bytes in the stream. expected 5. got at least 6'),
      ),
    ).toBeInstanceOf(ArchiveTooLargeError);
  });

  it('should map layout conflicts to INVALID_ARCHIVE', () => {
    const err: NodeJS.ErrnoException = new Error('ENOTDIR: not a directory');
    err.code = 'ENOTDIR';
    expect(toStagingError(err)).toMatchObject({ code: 'INVALID_ARCHIVE' });
  });

  it('should pass other filesystem errors through', () => {
    const err: NodeJS.ErrnoException = new Error('ENOSPC: no space left');
    err.code = 'ENOSPC';
    expect(toStagingError(err)).toBe(err);
  });

  it('should pass review errors through', () => {
    const err = new ArchiveTooLargeError('too big');
    expect(toStagingError(err)).toBe(err);
  });
});
