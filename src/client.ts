/**
 * Datasafe clients
 *
 * Prepare local datasets (manifest, archive) and hand them to a datasafe,
 * either in the same process ({@link LocalClient}) or over HTTP
 * ({@link HttpClient}).
 */

import { access, mkdtemp, readdir, rm } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import { packFiles, unpackArchive } from './archive.js';
import type { Backend } from './backend.js';
import { DEFAULT_MANIFEST_FILENAME } from './config.js';
import {
  AlreadyExistsError,
  DatasafeError,
  InvalidLoiError,
  LoiNotFoundError,
  MissingContentError,
  MissingLoiError,
  NotEmptyError,
  isErrnoException,
} from './errors.js';
import type { FormatDetector } from './format-detector.js';
import { createChildLogger, type Logger } from './logger.js';
import { Manifest, type IntegrityReport } from './manifest.js';

export const DEFAULT_METADATA_EXTENSIONS: readonly string[] = ['.info', '.yaml'];

export interface ClientOptions {
  /** Extensions marking metadata files; every other file is data. */
  metadataExtensions?: readonly string[];
  manifestFilename?: string;
  /** Digest for new manifests */
  algorithm?: string;
  detectors?: readonly FormatDetector[];
}

/**
 * Which files of a directory make up the dataset.
 */
export interface DatasetFiles {
  /** Directory holding the files (default: current directory) */
  path?: string;
  /** Only files named `<filename>.*` */
  filename?: string;
}

export interface DownloadResult {
  /** Fresh directory holding the downloaded files */
  directory: string;
  integrity: IntegrityReport;
  /** Set if the integrity check failed */
  warning?: string;
}

/**
 * Warning for a failed integrity check, undefined if everything matches.
 */
export function integrityWarning(integrity: IntegrityReport): string | undefined {
  if (integrity.data && integrity.all) return undefined;
  if (!integrity.data && !integrity.all) {
    return 'Integrity check failed, data and metadata may be corrupted.';
  }
  if (integrity.data) return 'Integrity check failed, metadata may be corrupted.';
  return 'Integrity check failed, data may be corrupted.';
}

export abstract class Client {
  readonly metadataExtensions: readonly string[];
  readonly manifestFilename: string;
  protected readonly log: Logger;
  private readonly algorithm: string | undefined;
  private readonly detectors: readonly FormatDetector[];

  constructor(options: ClientOptions = {}) {
    this.metadataExtensions = (options.metadataExtensions ?? DEFAULT_METADATA_EXTENSIONS).map(ext =>
      ext.toLowerCase()
    );
    this.manifestFilename = options.manifestFilename ?? DEFAULT_MANIFEST_FILENAME;
    this.algorithm = options.algorithm;
    this.detectors = options.detectors ?? [];
    this.log = createChildLogger({ component: 'client' });
  }

  /** Allocate a new LOI below the prefix of `loi`. */
  async create(loi: string): Promise<string> {
    if (!loi) throw new MissingLoiError();
    return this.sendCreate(loi);
  }

  /**
   * Write a manifest for the files of a dataset and return it.
   * With a `filename`, only files named `<filename>.*` belong to it.
   * Files with one of the {@link metadataExtensions} are metadata, the
   * manifest file itself is left out.
   */
  async createManifest(files: DatasetFiles = {}): Promise<Manifest> {
    const directory = resolve(files.path ?? '.');
    const entries = await readdir(directory, { withFileTypes: true });
    const names = entries
      .filter(entry => entry.isFile() && entry.name !== this.manifestFilename)
      .map(entry => entry.name)
      .filter(name => !files.filename || name.startsWith(`${files.filename}.`))
      .sort();

    const metadata = names.filter(name => this.metadataExtensions.includes(extname(name).toLowerCase()));
    const data = names.filter(name => !metadata.includes(name));

    const manifest = new Manifest({
      directory,
      filename: this.manifestFilename,
      algorithm: this.algorithm,
      detectors: this.detectors,
    });
    await manifest.populate(data, metadata);
    await manifest.toFile();
    this.log.debug({ path: manifest.path }, 'Wrote manifest');
    return manifest;
  }

  /** Upload a dataset to a reserved LOI; a missing manifest is created first. */
  async upload(loi: string, files: DatasetFiles = {}): Promise<IntegrityReport> {
    if (!loi) throw new MissingLoiError();
    return this.sendUpload(loi, await this.pack(loi, files));
  }

  /** Replace the content of a LOI; a missing manifest is created first. */
  async update(loi: string, files: DatasetFiles = {}): Promise<IntegrityReport> {
    if (!loi) throw new MissingLoiError();
    return this.sendUpdate(loi, await this.pack(loi, files));
  }

  /**
   * Download a dataset into a fresh temporary directory and check its
   * integrity. A failed check is logged and reported, not thrown.
   */
  async download(loi: string): Promise<DownloadResult> {
    if (!loi) throw new MissingLoiError();
    const content = await this.fetchDownload(loi);
    const directory = await mkdtemp(join(tmpdir(), 'datasafe-'));
    try {
      await unpackArchive(content, directory);
      const manifest = await Manifest.fromFile(join(directory, this.manifestFilename));
      const integrity = await manifest.checkIntegrity();
      const warning = integrityWarning(integrity);
      if (warning) this.log.warn({ loi, ...integrity }, warning);
      return { directory, integrity, warning };
    } catch (error) {
      await rm(directory, { recursive: true, force: true });
      throw error;
    }
  }

  protected abstract sendCreate(loi: string): Promise<string>;
  protected abstract sendUpload(loi: string, content: Buffer): Promise<IntegrityReport>;
  protected abstract sendUpdate(loi: string, content: Buffer): Promise<IntegrityReport>;
  protected abstract fetchDownload(loi: string): Promise<Buffer>;

  private async pack(loi: string, files: DatasetFiles): Promise<Buffer> {
    const directory = resolve(files.path ?? '.');
    const manifestPath = join(directory, this.manifestFilename);
    let manifest: Manifest;
    try {
      await access(manifestPath);
      manifest = await Manifest.fromFile(manifestPath);
    } catch (error) {
      if (!isErrnoException(error, 'ENOENT')) throw error;
      manifest = await this.createManifest(files);
    }
    manifest.loi = loi;
    await manifest.toFile();
    return packFiles(directory, [this.manifestFilename, ...manifest.dataFilenames, ...manifest.metadataFilenames]);
  }
}

/**
 * Client talking to a backend in the same process.
 */
export class LocalClient extends Client {
  constructor(
    private readonly backend: Backend,
    options: ClientOptions = {}
  ) {
    super({ manifestFilename: backend.storage.manifestFilename, ...options });
  }

  protected sendCreate(loi: string): Promise<string> {
    return this.backend.create(loi);
  }

  protected sendUpload(loi: string, content: Buffer): Promise<IntegrityReport> {
    return this.backend.upload(loi, content);
  }

  protected sendUpdate(loi: string, content: Buffer): Promise<IntegrityReport> {
    return this.backend.update(loi, content);
  }

  protected fetchDownload(loi: string): Promise<Buffer> {
    return this.backend.download(loi);
  }
}

export interface HttpClientOptions extends ClientOptions {
  baseUrl: string;
}

const IntegrityReportSchema = z.object({ data: z.boolean(), all: z.boolean() });
const ErrorBodySchema = z.object({ error: z.string(), code: z.string().optional() });

type ErrorClass = new (message: string, details?: Record<string, unknown>) => DatasafeError;

const ERRORS_BY_CODE: Readonly<Record<string, ErrorClass>> = {
  MISSING_LOI: MissingLoiError,
  INVALID_LOI: InvalidLoiError,
  LOI_NOT_FOUND: LoiNotFoundError,
  MISSING_CONTENT: MissingContentError,
  NOT_EMPTY: NotEmptyError,
  ALREADY_EXISTS: AlreadyExistsError,
};

/**
 * Client talking to a datasafe HTTP server.
 */
export class HttpClient extends Client {
  private baseUrl: string;

  constructor(opts: HttpClientOptions) {
    super(opts);
    this.baseUrl = opts.baseUrl.replace(/\/$/, '');
  }

  /** Whether the server answers its heartbeat. */
  async heartbeat(): Promise<boolean> {
    const res = await fetch(`${this.baseUrl}/heartbeat`);
    return res.ok && (await res.text()) === 'alive';
  }

  /** Storage paths known to the server. */
  async index(): Promise<string[]> {
    const res = await fetch(`${this.baseUrl}/api`);
    if (!res.ok) throw await this.failure(res);
    return z.object({ paths: z.array(z.string()) }).parse(await res.json()).paths;
  }

  protected async sendCreate(loi: string): Promise<string> {
    const res = await this.request(loi, { method: 'POST' });
    if (res.status !== 201) throw await this.failure(res);
    return res.text();
  }

  protected sendUpload(loi: string, content: Buffer): Promise<IntegrityReport> {
    return this.sendContent('PUT', loi, content);
  }

  protected sendUpdate(loi: string, content: Buffer): Promise<IntegrityReport> {
    return this.sendContent('PATCH', loi, content);
  }

  protected async fetchDownload(loi: string): Promise<Buffer> {
    const res = await this.request(loi);
    if (res.status === 204) throw new MissingContentError('LOI does not have content.', { loi });
    if (!res.ok) throw await this.failure(res);
    return Buffer.from(await res.arrayBuffer());
  }

  private async sendContent(method: 'PUT' | 'PATCH', loi: string, content: Buffer): Promise<IntegrityReport> {
    const res = await this.request(loi, {
      method,
      headers: { 'Content-Type': 'application/zip' },
      body: content,
    });
    if (!res.ok) throw await this.failure(res);
    return IntegrityReportSchema.parse(await res.json());
  }

  private request(loi: string, opts?: RequestInit): Promise<Response> {
    const path = loi.split('/').map(encodeURIComponent).join('/');
    return fetch(`${this.baseUrl}/api/${path}`, opts);
  }

  /** Error for a failed response, restored from its JSON body where possible. */
  private async failure(res: Response): Promise<DatasafeError> {
    const body = ErrorBodySchema.safeParse(await res.json().catch(() => undefined));
    if (!body.success) {
      return new DatasafeError(`Request failed: ${res.status}`, 'HTTP_ERROR', { status: res.status });
    }
    const ErrorType = body.data.code === undefined ? undefined : ERRORS_BY_CODE[body.data.code];
    if (ErrorType) return new ErrorType(body.data.error, { status: res.status });
    return new DatasafeError(body.data.error, body.data.code ?? 'HTTP_ERROR', { status: res.status });
  }
}
