/**
 * File-system storage backend.
 *
 * Every dataset lives in its own directory below the root, addressed by a
 * "/"-separated path (the type-specific part of its LOI). A directory is
 * either absent, reserved (created, possibly empty) or occupied (holding the
 * dataset files and their manifest).
 */

import { mkdir, readFile, readdir, rm, rmdir, stat } from 'node:fs/promises';
import { join, posix, relative, resolve, sep } from 'node:path';
import { packDirectory, unpackArchive } from './archive.js';
import { DEFAULT_MANIFEST_FILENAME } from './config.js';
import {
  AlreadyExistsError,
  InvalidPathError,
  MissingContentError,
  MissingPathError,
  PathNotFoundError,
  isErrnoException,
} from './errors.js';
import { createChildLogger } from './logger.js';
import { Manifest, type IntegrityReport } from './manifest.js';

const NUMERIC_NAME = /^\d+$/;

/** Attempts at creating the next numeric child when another process got there first. */
const MAX_ALLOCATION_ATTEMPTS = 10;

export interface StorageBackendOptions {
  rootDirectory: string;
  manifestFilename?: string;
}

export class StorageBackend {
  readonly rootDirectory: string;
  readonly manifestFilename: string;
  private readonly log = createChildLogger({ component: 'storage' });
  /** Tail of the pending allocations per parent directory. */
  private readonly allocations = new Map<string, Promise<void>>();

  constructor(options: StorageBackendOptions) {
    this.rootDirectory = resolve(options.rootDirectory);
    this.manifestFilename = options.manifestFilename ?? DEFAULT_MANIFEST_FILENAME;
  }

  /**
   * Absolute location of a storage path. The empty path is the root.
   *
   * @throws {InvalidPathError} if the path leaves the root
   */
  resolvePath(path: string): string {
    const target = resolve(this.rootDirectory, path);
    if (target !== this.rootDirectory && !target.startsWith(this.rootDirectory + sep)) {
      throw new InvalidPathError(undefined, { path });
    }
    return target;
  }

  /**
   * Create the directory for `path`, including missing parents.
   *
   * @throws {MissingPathError} for an empty path
   * @throws {AlreadyExistsError} if the directory exists
   */
  async create(path: string): Promise<void> {
    if (!path) throw new MissingPathError();
    const target = this.resolvePath(path);
    await mkdir(resolve(target, '..'), { recursive: true });
    try {
      await mkdir(target);
    } catch (error) {
      if (isErrnoException(error, 'EEXIST')) {
        throw new AlreadyExistsError(`Path already exists: ${path}`, { path });
      }
      throw error;
    }
    this.log.debug({ path }, 'Created directory');
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(this.resolvePath(path));
      return true;
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) return false;
      throw error;
    }
  }

  /**
   * @throws {PathNotFoundError} if the directory does not exist
   */
  async isEmpty(path: string): Promise<boolean> {
    try {
      const entries = await readdir(this.resolvePath(path));
      return entries.length === 0;
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        throw new PathNotFoundError(`Path does not exist: ${path}`, { path });
      }
      throw error;
    }
  }

  /**
   * Remove a directory. Without `force` only empty directories go; a
   * non-empty one fails with the system's ENOTEMPTY error.
   */
  async remove(path: string, force = false): Promise<void> {
    if (!path) throw new MissingPathError();
    const target = this.resolvePath(path);
    if (force) {
      await rm(target, { recursive: true });
    } else {
      await rmdir(target);
    }
    this.log.debug({ path, force }, 'Removed directory');
  }

  /**
   * Largest numeric child name of `path`, or 0 without numeric children.
   * Children whose names are not plain non-negative integers are skipped.
   */
  async getHighestId(path: string): Promise<number> {
    const entries = await readdir(this.resolvePath(path));
    let highest = 0;
    for (const name of entries) {
      if (!NUMERIC_NAME.test(name)) continue;
      highest = Math.max(highest, Number.parseInt(name, 10));
    }
    return highest;
  }

  /**
   * Create the child `<highest id + 1>` of `path` and return its storage path.
   *
   * Allocations under one parent run one after the other. The child is
   * created exclusively; if it appeared in the meantime (another process),
   * the next number is tried.
   */
  async createNextId(path: string): Promise<string> {
    const key = this.resolvePath(path);
    const previous = this.allocations.get(key) ?? Promise.resolve();
    const allocation = previous.then(() => this.allocateNextId(path));
    // The queue only orders allocations; failures reach the caller via `allocation`
    const tail = allocation.then(
      () => undefined,
      () => undefined
    );
    this.allocations.set(key, tail);
    try {
      return await allocation;
    } finally {
      if (this.allocations.get(key) === tail) this.allocations.delete(key);
    }
  }

  private async allocateNextId(path: string): Promise<string> {
    let candidate = (await this.getHighestId(path)) + 1;
    for (let attempt = 0; attempt < MAX_ALLOCATION_ATTEMPTS; attempt++) {
      const childPath = path ? posix.join(path, String(candidate)) : String(candidate);
      try {
        await mkdir(this.resolvePath(childPath));
        this.log.debug({ path: childPath }, 'Allocated id');
        return childPath;
      } catch (error) {
        if (!isErrnoException(error, 'EEXIST')) throw error;
        candidate++;
      }
    }
    throw new AlreadyExistsError(`No free id below ${path} after ${MAX_ALLOCATION_ATTEMPTS} attempts`, { path });
  }

  /**
   * Unpack an archive into `path` and check the integrity of what arrived.
   * Files stay in place whatever the verdict.
   *
   * @throws {MissingPathError} for an empty path
   * @throws {MissingContentError} for empty content or an archive without manifest
   */
  async deposit(path: string, content: Uint8Array | undefined): Promise<IntegrityReport> {
    if (!path) throw new MissingPathError();
    if (!content || content.length === 0) throw new MissingContentError();
    const written = await unpackArchive(content, this.resolvePath(path));
    this.log.debug({ path, files: written.length }, 'Deposited archive');
    return this.checkIntegrity(path);
  }

  /**
   * ZIP archive of everything in `path`.
   *
   * @throws {MissingPathError} for an empty path
   */
  async retrieve(path: string): Promise<Buffer> {
    if (!path) throw new MissingPathError();
    return packDirectory(this.resolvePath(path));
  }

  /**
   * Raw text of the manifest in `path`.
   *
   * @throws {MissingPathError} for an empty path
   * @throws {MissingContentError} if there is no manifest file
   */
  async getManifest(path: string): Promise<string> {
    if (!path) throw new MissingPathError();
    const target = this.resolvePath(path);
    await stat(target);
    try {
      return await readFile(join(target, this.manifestFilename), 'utf8');
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        throw new MissingContentError(`No manifest found in ${path}`, { path });
      }
      throw error;
    }
  }

  /**
   * All directories below the root that are empty or hold a manifest,
   * sorted, relative to the root.
   */
  async getIndex(): Promise<string[]> {
    const paths: string[] = [];
    try {
      await this.collectIndex(this.rootDirectory, paths);
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) return [];
      throw error;
    }
    return paths.sort();
  }

  private async collectIndex(dirPath: string, paths: string[]): Promise<void> {
    const entries = await readdir(dirPath, { withFileTypes: true });
    if (dirPath !== this.rootDirectory) {
      const hasManifest = entries.some(entry => entry.isFile() && entry.name === this.manifestFilename);
      if (entries.length === 0 || hasManifest) {
        paths.push(relative(this.rootDirectory, dirPath).split(sep).join('/'));
      }
    }
    for (const entry of entries) {
      if (entry.isDirectory()) await this.collectIndex(join(dirPath, entry.name), paths);
    }
  }

  /**
   * Integrity of the dataset in `path` according to its manifest.
   *
   * @throws {MissingContentError} if there is no manifest file
   */
  async checkIntegrity(path: string): Promise<IntegrityReport> {
    if (!path) throw new MissingPathError();
    const manifestPath = join(this.resolvePath(path), this.manifestFilename);
    let manifest: Manifest;
    try {
      manifest = await Manifest.fromFile(manifestPath);
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        throw new MissingContentError(`No manifest found in ${path}`, { path });
      }
      throw error;
    }
    const report = await manifest.checkIntegrity();
    if (!report.all) this.log.warn({ path, ...report }, 'Integrity check failed');
    return report;
  }
}
