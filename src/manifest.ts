/**
 * Dataset manifest: lists the files of a dataset with their checksums.
 *
 * Each dataset is accompanied by a YAML document (usually MANIFEST.yaml)
 * recording its LOI, the names and formats of its data and metadata files,
 * and two checksums: one over data and metadata, one over the data alone.
 * Data should never change once recorded, metadata may get corrected; the
 * two checksums tell these cases apart.
 */

import { access, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve, sep } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ChecksumGenerator, DEFAULT_ALGORITHM, algorithmFromLabel } from './checksum.js';
import { DEFAULT_MANIFEST_FILENAME } from './config.js';
import {
  InvalidManifestError,
  MissingFileError,
  MissingInformationError,
  isErrnoException,
} from './errors.js';
import { selectFormatDetector, type FormatDetector, type MetadataInfo } from './format-detector.js';

export const MANIFEST_TYPE = 'datasafe dataset manifest';
export const MANIFEST_FORMAT_VERSION = '0.1.0';

export const CHECKSUM_NAME = 'CHECKSUM';
export const DATA_CHECKSUM_NAME = 'CHECKSUM_data';
export const CHECKSUM_SPAN = 'data, metadata';
export const DATA_CHECKSUM_SPAN = 'data';

// YAML turns unquoted 1.0 or 42 into numbers
const text = z.union([z.string(), z.number()]).transform(value => String(value));

const ChecksumRecordSchema = z.object({
  name: text,
  format: text,
  span: text,
  value: text,
});

const MetadataInfoSchema = z.object({
  name: text,
  format: text.default(''),
  version: text.default(''),
});

export const ManifestDocumentSchema = z.object({
  format: z.object({
    type: z.literal(MANIFEST_TYPE),
    version: text,
  }),
  dataset: z
    .object({
      loi: text.nullish().transform(value => value ?? ''),
      complete: z.boolean().default(false),
    })
    .default({}),
  files: z.object({
    metadata: z.array(MetadataInfoSchema).nullish().transform(value => value ?? []),
    data: z.object({
      format: text.nullish().transform(value => value ?? ''),
      names: z.array(text).nullish().transform(value => value ?? []),
    }),
  }),
  checksums: z.array(ChecksumRecordSchema).nullish().transform(value => value ?? []),
});

export type ChecksumRecord = z.infer<typeof ChecksumRecordSchema>;
export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;

/**
 * Result of comparing stored checksums with checksums of the files on disk.
 */
export interface IntegrityReport {
  /** Data checksum matches */
  data: boolean;
  /** Data + metadata checksum matches */
  all: boolean;
}

export interface ManifestOptions {
  /** Directory the file names are relative to (default: current directory) */
  directory?: string;
  /** Manifest file name (default: MANIFEST.yaml) */
  filename?: string;
  /** Digest for new checksums (default: md5) */
  algorithm?: string;
  /** Format detectors in order of preference */
  detectors?: readonly FormatDetector[];
}

export class Manifest {
  loi = '';
  complete = false;
  dataFilenames: string[] = [];
  metadataFilenames: string[] = [];
  dataFormat = '';
  metadataInfo: MetadataInfo[] = [];
  checksum = '';
  dataChecksum = '';
  formatVersion = MANIFEST_FORMAT_VERSION;

  readonly directory: string;
  readonly filename: string;
  private checksumFormat: string;
  private readonly detectors: readonly FormatDetector[];

  constructor(options: ManifestOptions = {}) {
    this.directory = resolve(options.directory ?? '.');
    this.filename = options.filename ?? DEFAULT_MANIFEST_FILENAME;
    this.detectors = options.detectors ?? [];
    this.checksumFormat = new ChecksumGenerator(options.algorithm ?? DEFAULT_ALGORITHM).label;
  }

  /** Full path of the manifest file. */
  get path(): string {
    return join(this.directory, this.filename);
  }

  /**
   * Record files, detect their formats and compute both checksums.
   *
   * @throws {MissingInformationError} if either list is empty
   * @throws {MissingFileError} if a listed file does not exist
   */
  async populate(
    dataFilenames: readonly string[] = this.dataFilenames,
    metadataFilenames: readonly string[] = this.metadataFilenames
  ): Promise<void> {
    if (dataFilenames.length === 0) {
      throw new MissingInformationError('Data filenames missing');
    }
    if (metadataFilenames.length === 0) {
      throw new MissingInformationError('Metadata filenames missing');
    }
    await this.assertFilesExist(dataFilenames, 'data');
    await this.assertFilesExist(metadataFilenames, 'metadata');

    const dataPaths = dataFilenames.map(name => this.resolveFile(name));
    const metadataPaths = metadataFilenames.map(name => this.resolveFile(name));
    const detector = selectFormatDetector(this.detectors, dataPaths);
    const generator = new ChecksumGenerator(this.algorithm);

    this.dataFilenames = [...dataFilenames];
    this.metadataFilenames = [...metadataFilenames];
    this.dataFormat = detector.dataFormat(dataPaths);
    const infos = await detector.metadataFormat(metadataPaths);
    this.metadataInfo = infos.map((info, index) => ({ ...info, name: metadataFilenames[index] }));
    this.checksum = await generator.hashFileSet([...dataPaths, ...metadataPaths]);
    this.dataChecksum = await generator.hashFileSet(dataPaths);
    this.checksumFormat = generator.label;
  }

  /**
   * Structured document, keys in stable order.
   *
   * @throws {MissingInformationError} if no data files are recorded
   */
  toDocument(): ManifestDocument {
    if (this.dataFilenames.length === 0) {
      throw new MissingInformationError('Data filenames missing');
    }
    return {
      format: {
        type: MANIFEST_TYPE,
        version: this.formatVersion,
      },
      dataset: {
        loi: this.loi,
        complete: this.complete,
      },
      files: {
        metadata: this.metadataInfo.map(({ name, format, version }) => ({ name, format, version })),
        data: {
          format: this.dataFormat,
          names: [...this.dataFilenames],
        },
      },
      checksums: [
        {
          name: CHECKSUM_NAME,
          format: this.checksumFormat,
          span: CHECKSUM_SPAN,
          value: this.checksum,
        },
        {
          name: DATA_CHECKSUM_NAME,
          format: this.checksumFormat,
          span: DATA_CHECKSUM_SPAN,
          value: this.dataChecksum,
        },
      ],
    };
  }

  /**
   * Read a manifest from its structured document.
   *
   * @throws {InvalidManifestError} if the document does not match the schema
   */
  static fromDocument(document: unknown, options: ManifestOptions = {}): Manifest {
    const result = ManifestDocumentSchema.safeParse(document);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new InvalidManifestError(`Invalid manifest: ${issue.path.join('.') || 'document'} ${issue.message}`, {
        path: issue.path,
      });
    }
    const parsed = result.data;
    const manifest = new Manifest(options);
    const checksum = parsed.checksums.find(record => record.name === CHECKSUM_NAME);
    const dataChecksum = parsed.checksums.find(record => record.name === DATA_CHECKSUM_NAME);

    manifest.formatVersion = parsed.format.version;
    manifest.loi = parsed.dataset.loi;
    manifest.complete = parsed.dataset.complete;
    manifest.metadataInfo = parsed.files.metadata;
    manifest.metadataFilenames = parsed.files.metadata.map(info => info.name);
    manifest.dataFormat = parsed.files.data.format;
    manifest.dataFilenames = parsed.files.data.names;
    manifest.checksum = checksum?.value ?? '';
    manifest.dataChecksum = dataChecksum?.value ?? '';
    const format = checksum?.format ?? dataChecksum?.format;
    if (format) manifest.checksumFormat = format;
    return manifest;
  }

  toYaml(): string {
    return yaml.dump(this.toDocument(), { lineWidth: -1 });
  }

  /**
   * @throws {InvalidManifestError} if the text is not YAML or not a manifest
   */
  static fromYaml(contents: string, options: ManifestOptions = {}): Manifest {
    let document: unknown;
    try {
      document = yaml.load(contents);
    } catch (error) {
      throw new InvalidManifestError(`Manifest is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
    }
    return Manifest.fromDocument(document, options);
  }

  /**
   * Write the manifest file; returns its path.
   */
  async toFile(): Promise<string> {
    await writeFile(this.path, this.toYaml(), 'utf8');
    return this.path;
  }

  /**
   * Load a manifest file. File names in it are taken relative to its directory.
   */
  static async fromFile(
    filePath: string,
    options: Omit<ManifestOptions, 'directory' | 'filename'> = {}
  ): Promise<Manifest> {
    const contents = await readFile(filePath, 'utf8');
    return Manifest.fromYaml(contents, {
      ...options,
      directory: dirname(filePath),
      filename: basename(filePath),
    });
  }

  /**
   * Compare stored checksums with checksums of the files currently on disk.
   * Stored values are left untouched.
   *
   * @throws {MissingInformationError} if file names or checksums are missing
   * @throws {MissingFileError} if a listed file is gone
   */
  async checkIntegrity(): Promise<IntegrityReport> {
    if (this.dataFilenames.length === 0) {
      throw new MissingInformationError('Data filenames missing');
    }
    if (this.metadataFilenames.length === 0) {
      throw new MissingInformationError('Metadata filenames missing');
    }
    if (!this.checksum || !this.dataChecksum) {
      throw new MissingInformationError('Checksum(s) missing');
    }
    await this.assertFilesExist(this.dataFilenames, 'data');
    await this.assertFilesExist(this.metadataFilenames, 'metadata');

    const generator = new ChecksumGenerator(this.algorithm);
    const dataPaths = this.dataFilenames.map(name => this.resolveFile(name));
    const metadataPaths = this.metadataFilenames.map(name => this.resolveFile(name));
    const checksum = await generator.hashFileSet([...dataPaths, ...metadataPaths]);
    const dataChecksum = await generator.hashFileSet(dataPaths);

    return {
      data: dataChecksum === this.dataChecksum,
      all: checksum === this.checksum,
    };
  }

  /** Digest named in the checksum records. */
  get algorithm(): string {
    return algorithmFromLabel(this.checksumFormat) ?? DEFAULT_ALGORITHM;
  }

  /**
   * @throws {InvalidManifestError} if the name points outside the dataset directory
   */
  private resolveFile(name: string): string {
    const target = resolve(this.directory, name);
    if (!target.startsWith(this.directory + sep)) {
      throw new InvalidManifestError(`File outside dataset directory: ${name}`, { name });
    }
    return target;
  }

  private async assertFilesExist(filenames: readonly string[], kind: 'data' | 'metadata'): Promise<void> {
    const missing: string[] = [];
    for (const name of filenames) {
      try {
        await access(this.resolveFile(name));
      } catch (error) {
        if (!isErrnoException(error, 'ENOENT')) throw error;
        missing.push(name);
      }
    }
    if (missing.length > 0) {
      throw new MissingFileError(`${kind} file(s) not existent`, { missing });
    }
  }
}
