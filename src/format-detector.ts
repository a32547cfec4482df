/**
 * Detection of data and metadata formats for manifests.
 *
 * A manifest records the format of the data files and, for each metadata
 * file, its format and version. Detectors are passed to the manifest in
 * order of preference; the first one whose detection succeeds for the data
 * files is used, otherwise the {@link DefaultFormatDetector}.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import yaml from 'js-yaml';
import { ConfigurationError } from './errors.js';

export const UNDETECTED_FORMAT = 'undetected';

export interface MetadataInfo {
  name: string;
  format: string;
  version: string;
}

export interface FormatDetector {
  /** Format of the data files as a whole. */
  dataFormat(dataFilenames: readonly string[]): string;
  /** Format and version per metadata file, in the order given. */
  metadataFormat(metadataFilenames: readonly string[]): Promise<MetadataInfo[]>;
  /** Whether this detector recognises the data files at all. */
  detectionSuccessful(dataFilenames: readonly string[]): boolean;
}

/**
 * Reads format and version from the contents of one metadata file.
 * Returns undefined if the contents are not recognised.
 */
export type MetadataParser = (contents: string) => Omit<MetadataInfo, 'name'> | undefined;

const EXTENSION_PATTERN = /^\.[A-Za-z0-9]+$/;

/**
 * First line of an info file: "<format> - v. <version> (<date>)", the
 * leading "#" and the date being optional.
 */
export function parseInfoFile(contents: string): Omit<MetadataInfo, 'name'> | undefined {
  const [firstLine = ''] = contents.split(/\r?\n/, 1);
  const match = /^#?\s*(.+?)\s+-\s+v\.\s*(\d[\w.-]*)/.exec(firstLine);
  if (!match) return undefined;
  return { format: match[1], version: match[2] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * YAML metadata documents describe themselves in a top-level
 * `format: {type, version}` block.
 */
export function parseYamlFile(contents: string): Omit<MetadataInfo, 'name'> | undefined {
  let document: unknown;
  try {
    document = yaml.load(contents);
  } catch {
    return undefined;
  }
  if (!isRecord(document) || !isRecord(document.format)) return undefined;
  const { type, version } = document.format;
  if (typeof type !== 'string') return undefined;
  return { format: type, version: version === undefined || version === null ? '' : String(version) };
}

export const DEFAULT_METADATA_PARSERS: Readonly<Record<string, MetadataParser>> = {
  '.info': parseInfoFile,
  '.yaml': parseYamlFile,
  '.yml': parseYamlFile,
};

/**
 * Fallback detector: data format is never detected, metadata formats are
 * read by the parser registered for the file's extension.
 */
export class DefaultFormatDetector implements FormatDetector {
  private readonly parsers: ReadonlyMap<string, MetadataParser>;

  /**
   * @param parsers - Extra parsers by extension (".ext"); they take
   *   precedence over the built-in ones.
   * @throws {ConfigurationError} for a key that is not an extension
   */
  constructor(parsers: Readonly<Record<string, MetadataParser>> = {}) {
    const table = new Map<string, MetadataParser>();
    for (const [extension, parser] of Object.entries({ ...DEFAULT_METADATA_PARSERS, ...parsers })) {
      if (!EXTENSION_PATTERN.test(extension)) {
        throw new ConfigurationError(`Invalid metadata file extension: ${extension}`, { extension });
      }
      table.set(extension.toLowerCase(), parser);
    }
    this.parsers = table;
  }

  dataFormat(_dataFilenames: readonly string[]): string {
    return UNDETECTED_FORMAT;
  }

  detectionSuccessful(dataFilenames: readonly string[]): boolean {
    return this.dataFormat(dataFilenames) !== '';
  }

  async metadataFormat(metadataFilenames: readonly string[]): Promise<MetadataInfo[]> {
    const infos: MetadataInfo[] = [];
    for (const filename of metadataFilenames) {
      infos.push(await this.detectMetadata(filename));
    }
    return infos;
  }

  private async detectMetadata(filename: string): Promise<MetadataInfo> {
    const name = basename(filename);
    const parser = this.parsers.get(extname(filename).toLowerCase());
    const detected = parser ? parser(await readFile(filename, 'utf8')) : undefined;
    return { name, ...(detected ?? { format: UNDETECTED_FORMAT, version: '' }) };
  }
}

/**
 * EPR spectrometer data, recognised by the vendors' file extensions.
 */
export class EprFormatDetector extends DefaultFormatDetector {
  dataFormat(dataFilenames: readonly string[]): string {
    const extensions = new Set(dataFilenames.map(name => extname(name)));
    if (extensions.has('.DSC') && extensions.has('.DTA')) return 'BES3T';
    if (extensions.has('.par') && extensions.has('.spc')) return 'BrukerEMX';
    if (extensions.has('.xml')) return 'Magnettech';
    return '';
  }
}

/**
 * First detector recognising the data files, or the default one.
 */
export function selectFormatDetector(
  detectors: readonly FormatDetector[],
  dataFilenames: readonly string[]
): FormatDetector {
  return detectors.find(d => d.detectionSuccessful(dataFilenames)) ?? new DefaultFormatDetector();
}
