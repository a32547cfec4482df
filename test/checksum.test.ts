import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ChecksumGenerator,
  CHUNK_SIZE,
  algorithmFromLabel,
  checksumLabel,
  isSupportedAlgorithm,
} from '../src/checksum.js';
import { ConfigurationError } from '../src/errors.js';

describe('checksum', () => {
  const tmp = join(tmpdir(), `datasafe-checksum-${Date.now()}`);
  const generator = new ChecksumGenerator();

  before(async () => {
    await mkdir(tmp, { recursive: true });
    await writeFile(join(tmp, 'a.txt'), 'hello');
    await writeFile(join(tmp, 'b.txt'), 'hello');
    await writeFile(join(tmp, 'c.txt'), 'world');
    await writeFile(join(tmp, 'large.bin'), Buffer.alloc(CHUNK_SIZE * 3 + 17, 7));
  });

  after(async () => {
    await rm(tmp, { recursive: true });
  });

  it('should default to md5', () => {
    assert.strictEqual(generator.algorithm, 'md5');
    assert.strictEqual(generator.label, 'MD5 checksum');
  });

  it('should compute md5 of a string', () => {
    assert.strictEqual(generator.hashBytes('hello'), '5d41402abc4b2a76b9719d911017c592');
  });

  it('should compute md5 of empty input', () => {
    assert.strictEqual(generator.hashBytes(Buffer.alloc(0)), 'd41d8cd98f00b204e9800998ecf8427e');
  });

  it('should support other digests', () => {
    const sha256 = new ChecksumGenerator('sha256');
    assert.strictEqual(
      sha256.hashBytes('hello'),
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
    assert.strictEqual(sha256.label, 'SHA256 checksum');
  });

  it('should reject unknown digests', () => {
    assert.throws(() => new ChecksumGenerator('no-such-digest'), ConfigurationError);
    assert.strictEqual(isSupportedAlgorithm('no-such-digest'), false);
  });

  it('should hash strings independent of order', () => {
    const strings = ['b', 'a', 'c'];
    const expected = generator.hashStrings(strings);
    assert.strictEqual(generator.hashStrings(['a', 'b', 'c']), expected);
    assert.strictEqual(generator.hashStrings(['c', 'b', 'a']), expected);
    assert.strictEqual(generator.hashStrings(['a', 'b']), '187ef4436122d1cc2f40dc2b92f0eba0');
  });

  it('should hash file contents, not names', async () => {
    const a = await generator.hashFile(join(tmp, 'a.txt'));
    const b = await generator.hashFile(join(tmp, 'b.txt'));
    assert.strictEqual(a, '5d41402abc4b2a76b9719d911017c592');
    assert.strictEqual(a, b);
  });

  it('should stream files larger than one chunk', async () => {
    const expected = generator.hashBytes(Buffer.alloc(CHUNK_SIZE * 3 + 17, 7));
    assert.strictEqual(await generator.hashFile(join(tmp, 'large.bin')), expected);
  });

  it('should treat a single file like hashFile', async () => {
    const file = join(tmp, 'c.txt');
    const expected = await generator.hashFile(file);
    assert.strictEqual(await generator.hashFileSet(file), expected);
    assert.strictEqual(await generator.hashFileSet([file]), expected);
  });

  it('should hash several files as checksum of sorted checksums', async () => {
    const files = [join(tmp, 'c.txt'), join(tmp, 'a.txt')];
    const expected = generator.hashStrings([
      '5d41402abc4b2a76b9719d911017c592',
      generator.hashBytes('world'),
    ]);
    assert.strictEqual(await generator.hashFileSet(files), expected);
    assert.strictEqual(await generator.hashFileSet([...files].reverse()), expected);
  });

  it('should reject a missing file', async () => {
    await assert.rejects(generator.hashFile(join(tmp, 'missing.txt')), { code: 'ENOENT' });
  });

  it('should map labels to algorithms and back', () => {
    assert.strictEqual(checksumLabel('sha1'), 'SHA1 checksum');
    assert.strictEqual(algorithmFromLabel('MD5 checksum'), 'md5');
    assert.strictEqual(algorithmFromLabel('whatever'), undefined);
  });
});
