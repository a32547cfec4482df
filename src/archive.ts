import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { dirname, join, relative, resolve, sep } from 'node:path';
import JSZip from 'jszip';
import { InvalidArchiveError } from './errors.js';

/**
 * Dataset archives are ZIP files built and read in memory; nothing is
 * written to a temporary file on the way.
 */

export interface ArchiveEntry {
  name: string;
  data: Buffer;
}

/**
 * All regular files below a directory, as sorted paths relative to it with
 * "/" separators.
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  const files = await walkDir(dirPath);
  return files.map(file => relative(dirPath, file).split(sep).join('/')).sort();
}

async function walkDir(dirPath: string): Promise<string[]> {
  const results: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await walkDir(full)));
    } else if (entry.isFile()) {
      results.push(full);
    }
  }
  return results;
}

/**
 * ZIP archive of the given files, stored under their names relative to `directory`.
 */
export async function packFiles(directory: string, names: readonly string[]): Promise<Buffer> {
  const zip = new JSZip();
  for (const name of names) {
    zip.file(name, await readFile(join(directory, name)));
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/**
 * ZIP archive of every file below `directory`.
 */
export async function packDirectory(directory: string): Promise<Buffer> {
  return packFiles(directory, await listFiles(directory));
}

/**
 * Read all file entries of an archive.
 *
 * @throws {InvalidArchiveError} if the bytes are not a ZIP archive
 */
export async function readArchive(bytes: Uint8Array): Promise<ArchiveEntry[]> {
  const zip = new JSZip();
  try {
    await zip.loadAsync(bytes);
  } catch (error) {
    throw new InvalidArchiveError(`Not a ZIP archive: ${error instanceof Error ? error.message : String(error)}`);
  }

  const entries: ArchiveEntry[] = [];
  for (const [name, file] of Object.entries(zip.files)) {
    if (file.dir) continue;
    entries.push({ name, data: await file.async('nodebuffer') });
  }
  return entries;
}

/**
 * Extract an archive into `directory` (created if needed). Returns the names
 * written, relative to `directory`.
 *
 * @throws {InvalidArchiveError} if the bytes are not a ZIP archive or an
 *   entry would land outside `directory`
 */
export async function unpackArchive(bytes: Uint8Array, directory: string): Promise<string[]> {
  const entries = await readArchive(bytes);
  const root = resolve(directory);

  // Check every entry before writing any of them
  for (const entry of entries) {
    const target = resolve(root, entry.name);
    if (!target.startsWith(root + sep)) {
      throw new InvalidArchiveError(`Archive entry outside target directory: ${entry.name}`, {
        entry: entry.name,
      });
    }
  }

  await mkdir(root, { recursive: true });
  for (const entry of entries) {
    const target = resolve(root, entry.name);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, entry.data);
  }
  return entries.map(entry => entry.name).sort();
}
