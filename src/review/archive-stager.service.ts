import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import yauzl, { type Entry, type ZipFile } from 'yauzl';
import { createWriteStream } from 'node:fs';
import { mkdtemp, mkdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { Transform, type Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { LimitsConfig } from '../config/config.types.js';
import { STAGING_DIR_PREFIX } from '../constants.js';
import { resolveEntryPath } from './path-utils.js';
import {
  ArchiveTooLargeError,
  PathTraversalError,
  ReviewError,
  ValidationError,
} from './review.errors.js';
import type { StagedEntry, StagedProject } from './review.types.js';

const UNSAFE_NAME_ERROR =
  /^(?:invalid relative path|absolute path|invalid characters in fileName): (.*)$/s;
const OVERSIZED_STREAM_ERROR = /^too many bytes in the stream/;
const LAYOUT_ERROR_CODES = new Set(['ENOTDIR', 'EEXIST', 'EISDIR']);

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

function isSymlink(entry: Entry): boolean {
  return ((entry.externalFileAttributes >>> 16) & S_IFMT) === S_IFLNK;
}

function isDirectory(entry: Entry): boolean {
  return entry.fileName.endsWith('/');
}

function openZip(archive: Buffer): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(
      archive,
      { lazyEntries: true, decodeStrings: true, validateEntrySizes: true },
      (err, zipfile) => {
        if (err || !zipfile) {
          reject(err ?? new Error('Failed to open archive'));
          return;
        }
        resolve(zipfile);
      },
    );
  });
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(err ?? new Error(`Failed to read entry "${entry.fileName}"`));
        return;
      }
      resolve(stream);
    });
  });
}

/** Translate archive library and filesystem failures into review errors. */
export function toStagingError(error: unknown): unknown {
  if (error instanceof ReviewError || !(error instanceof Error)) return error;
  if ('code' in error && typeof error.code === 'string') {
    if (LAYOUT_ERROR_CODES.has(error.code)) {
      return new ValidationError(
        'INVALID_ARCHIVE',
        'Archive contains conflicting file and directory entries',
        'project_zip',
      );
    }
    return error;
  }
  const unsafe = UNSAFE_NAME_ERROR.exec(error.message);
  if (unsafe) return new PathTraversalError(unsafe[1]);
  if (OVERSIZED_STREAM_ERROR.test(error.message)) {
    return new ArchiveTooLargeError(
      'Archive entry is larger than its declared size',
    );
  }
  return new ValidationError(
    'INVALID_ARCHIVE',
    `Archive is corrupt: ${error.message}`,
    'project_zip',
  );
}

@Injectable()
export class ArchiveStagerService {
  constructor(@Inject(ConsoleLogger) private readonly logger: ConsoleLogger) {
    this.logger.setContext(ArchiveStagerService.name);
  }

  /**
   * Extract `archive` into a fresh temporary directory, run `fn` on it, and
   * remove the directory on every exit path.
   */
  async withStagedProject<T>(
    archive: Buffer,
    limits: Readonly<LimitsConfig>,
    fn: (project: StagedProject) => Promise<T>,
  ): Promise<T> {
    const root = await mkdtemp(join(tmpdir(), STAGING_DIR_PREFIX));
    try {
      const project = await this.stage(archive, root, limits);
      return await fn(project);
    } finally {
      await this.cleanup(root);
    }
  }

  private async stage(
    archive: Buffer,
    root: string,
    limits: Readonly<LimitsConfig>,
  ): Promise<StagedProject> {
    try {
      const entries = await this.scan(archive, root, limits);
      await this.extract(archive, root, limits);
      this.logger.debug(
        `Staged ${entries.length} file(s) into ${root}`,
      );
      return { root, entries };
    } catch (error) {
      throw toStagingError(error);
    }
  }

  /** First pass: check names and declared sizes without writing anything. */
  private async scan(
    archive: Buffer,
    root: string,
    limits: Readonly<LimitsConfig>,
  ): Promise<StagedEntry[]> {
    const zipfile = await openZip(archive);
    if (zipfile.entryCount > limits.maxArchiveEntries) {
      zipfile.close();
      throw new ArchiveTooLargeError(
        `Archive has ${zipfile.entryCount} entries, limit is ${limits.maxArchiveEntries}`,
      );
    }

    const files = new Map<string, number>();
    let declaredTotal = 0;
    let symlinks = 0;
    await this.walk(zipfile, async (entry) => {
      const path = resolveEntryPath(entry.fileName, root);
      if (path === null) throw new PathTraversalError(entry.fileName);
      if (isSymlink(entry)) {
        symlinks++;
        return;
      }
      if (path === '' || isDirectory(entry)) return;
      if (entry.uncompressedSize > limits.maxEntryBytes) {
        throw new ArchiveTooLargeError(
          `Entry "${path}" is ${entry.uncompressedSize} bytes, limit is ${limits.maxEntryBytes}`,
        );
      }
      declaredTotal += entry.uncompressedSize - (files.get(path) ?? 0);
      if (declaredTotal > limits.maxExtractedBytes) {
        throw new ArchiveTooLargeError(
          `Archive expands beyond ${limits.maxExtractedBytes} bytes`,
        );
      }
      files.set(path, entry.uncompressedSize);
    });

    if (symlinks > 0) {
      this.logger.warn(`Skipped ${symlinks} symlink entr${symlinks === 1 ? 'y' : 'ies'}`);
    }
    return [...files.entries()]
      .map(([path, size]) => ({ path, size }))
      .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  /** Second pass: write entries while counting the bytes actually produced. */
  private async extract(
    archive: Buffer,
    root: string,
    limits: Readonly<LimitsConfig>,
  ): Promise<void> {
    const zipfile = await openZip(archive);
    let extracted = 0;
    await this.walk(zipfile, async (entry) => {
      const path = resolveEntryPath(entry.fileName, root);
      if (path === null) throw new PathTraversalError(entry.fileName);
      if (path === '' || isSymlink(entry)) return;
      const target = join(root, path);
      if (isDirectory(entry)) {
        await mkdir(target, { recursive: true });
        return;
      }
      await mkdir(dirname(target), { recursive: true });

      let written = 0;
      const counter = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          written += chunk.length;
          extracted += chunk.length;
          if (written > limits.maxEntryBytes) {
            callback(
              new ArchiveTooLargeError(
                `Entry "${path}" exceeds ${limits.maxEntryBytes} bytes`,
              ),
            );
          } else if (extracted > limits.maxExtractedBytes) {
            callback(
              new ArchiveTooLargeError(
                `Archive expands beyond ${limits.maxExtractedBytes} bytes`,
              ),
            );
          } else {
            callback(null, chunk);
          }
        },
      });
      const source = await openEntryStream(zipfile, entry);
      await pipeline(source, counter, createWriteStream(target));
    });
  }

  private walk(
    zipfile: ZipFile,
    visit: (entry: Entry) => Promise<void>,
  ): Promise<void> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const fail = (error: unknown): void => {
        if (settled) return;
        settled = true;
        zipfile.close();
        reject(error);
      };
      zipfile.on('error', fail);
      zipfile.on('end', () => {
        if (settled) return;
        settled = true;
        resolve();
      });
      zipfile.on('entry', (entry: Entry) => {
        visit(entry).then(() => {
          if (!settled) zipfile.readEntry();
        }, fail);
      });
      zipfile.readEntry();
    });
  }

  private async cleanup(root: string): Promise<void> {
    try {
      await rm(root, { recursive: true, force: true });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to remove staging directory ${root}: ${msg}`);
    }
  }
}
