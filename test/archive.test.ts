import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { writeFile, mkdir, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import JSZip from 'jszip';
import { listFiles, packDirectory, packFiles, readArchive, unpackArchive } from '../src/archive.js';
import { InvalidArchiveError } from '../src/errors.js';

describe('archive', () => {
  const tmp = join(tmpdir(), `datasafe-archive-${Date.now()}`);
  const dataset = join(tmp, 'dataset');

  before(async () => {
    await mkdir(join(dataset, 'raw'), { recursive: true });
    await writeFile(join(dataset, 'MANIFEST.yaml'), 'format: {}\n');
    await writeFile(join(dataset, 'data.csv'), '1,2,3\n');
    await writeFile(join(dataset, 'raw', 'scan.bin'), Buffer.from([0, 1, 2, 255]));
  });

  after(async () => {
    await rm(tmp, { recursive: true });
  });

  it('should list files recursively with relative names', async () => {
    assert.deepStrictEqual(await listFiles(dataset), ['MANIFEST.yaml', 'data.csv', 'raw/scan.bin']);
  });

  it('should pack a whole directory', async () => {
    const entries = await readArchive(await packDirectory(dataset));
    const names = entries.map(entry => entry.name).sort();
    assert.deepStrictEqual(names, ['MANIFEST.yaml', 'data.csv', 'raw/scan.bin']);
    const scan = entries.find(entry => entry.name === 'raw/scan.bin');
    assert.deepStrictEqual(scan?.data, Buffer.from([0, 1, 2, 255]));
  });

  it('should pack only the files named', async () => {
    const entries = await readArchive(await packFiles(dataset, ['data.csv']));
    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0].name, 'data.csv');
    assert.strictEqual(entries[0].data.toString('utf8'), '1,2,3\n');
  });

  it('should unpack into a new directory', async () => {
    const target = join(tmp, 'unpacked');
    const written = await unpackArchive(await packDirectory(dataset), target);

    assert.deepStrictEqual(written, ['MANIFEST.yaml', 'data.csv', 'raw/scan.bin']);
    assert.strictEqual(await readFile(join(target, 'data.csv'), 'utf8'), '1,2,3\n');
    assert.deepStrictEqual(await readFile(join(target, 'raw', 'scan.bin')), Buffer.from([0, 1, 2, 255]));
  });

  it('should reject bytes that are no archive', async () => {
    await assert.rejects(unpackArchive(Buffer.from('not a zip'), join(tmp, 'never')), InvalidArchiveError);
  });

  it('should never write outside the target directory', async () => {
    const zip = new JSZip();
    zip.file('../escaped.txt', 'gotcha');
    const bytes = await zip.generateAsync({ type: 'nodebuffer' });

    // Either refused, or the entry name is sanitized on load
    await unpackArchive(bytes, join(tmp, 'guarded')).catch((err: unknown) => {
      assert.ok(err instanceof InvalidArchiveError);
      return [];
    });
    await assert.rejects(readFile(join(tmp, 'escaped.txt')), { code: 'ENOENT' });
  });
});
