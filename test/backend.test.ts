import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Backend } from '../src/backend.js';
import { StorageBackend } from '../src/storage.js';
import { Manifest } from '../src/manifest.js';
import { packDirectory, readArchive } from '../src/archive.js';
import {
  InvalidLoiError,
  LoiNotFoundError,
  MissingContentError,
  MissingLoiError,
  NotEmptyError,
} from '../src/errors.js';

describe('backend', () => {
  const tmp = join(tmpdir(), `datasafe-backend-${Date.now()}`);
  const source = join(tmp, 'source');
  let content: Buffer;
  let counter = 0;

  function freshBackend(): Backend {
    return new Backend(new StorageBackend({ rootDirectory: join(tmp, `root-${++counter}`) }));
  }

  before(async () => {
    await mkdir(source, { recursive: true });
    await writeFile(join(source, 'data.csv'), '1,2,3\n');
    await writeFile(join(source, 'data.info'), 'cwEPR Info file - v. 0.1.4 (2020-01-21)\n');
    const manifest = new Manifest({ directory: source });
    await manifest.populate(['data.csv'], ['data.info']);
    await manifest.toFile();
    content = await packDirectory(source);
  });

  after(async () => {
    await rm(tmp, { recursive: true });
  });

  describe('create', () => {
    it('should allocate the first measurement', async () => {
      const backend = freshBackend();
      assert.strictEqual(await backend.create('42.1001/ds/exp/sa/42/cwepr/1'), '42.1001/ds/exp/sa/42/cwepr/1');
      assert.strictEqual(await backend.storage.exists('exp/sa/42/cwepr/1'), true);
    });

    it('should count up below the same prefix', async () => {
      const backend = freshBackend();
      await backend.create('42.1001/ds/exp/sa/42/cwepr');
      assert.strictEqual(await backend.create('42.1001/ds/exp/sa/42/cwepr'), '42.1001/ds/exp/sa/42/cwepr/2');
      assert.strictEqual(await backend.create('42.1001/ds/exp/sa/42/trepr'), '42.1001/ds/exp/sa/42/trepr/1');
    });

    it('should use a shorter prefix for dated measurements', async () => {
      const backend = freshBackend();
      assert.strictEqual(
        await backend.create('42.1001/ds/exp/2020-04-25/cwepr'),
        '42.1001/ds/exp/2020-04-25/cwepr/1'
      );
      assert.deepStrictEqual(await backend.index(), ['exp/2020-04-25/cwepr/1']);
    });

    it('should serve concurrent allocations below a new prefix', async () => {
      const backend = freshBackend();
      const created = await Promise.all([
        backend.create('42.1001/ds/exp/sa/42/cwepr'),
        backend.create('42.1001/ds/exp/sa/42/cwepr'),
      ]);
      assert.deepStrictEqual(created.sort(), ['42.1001/ds/exp/sa/42/cwepr/1', '42.1001/ds/exp/sa/42/cwepr/2']);
    });

    it('should reject missing and invalid LOIs', async () => {
      const backend = freshBackend();
      await assert.rejects(backend.create(''), MissingLoiError);
      await assert.rejects(backend.create('43.1001/ds/exp/sa/42/cwepr'), InvalidLoiError);
      await assert.rejects(backend.create('42.1001/ds/exp/sa/42'), InvalidLoiError);
      await assert.rejects(backend.create('42.1001/rec/42'), /Only experimental dataset LOIs can be created\./);
      await assert.rejects(backend.create('42.1001/ds/calc/geo/1'), InvalidLoiError);
    });
  });

  describe('upload', () => {
    it('should deposit into a reserved LOI', async () => {
      const backend = freshBackend();
      const loi = await backend.create('42.1001/ds/exp/sa/42/cwepr');
      assert.deepStrictEqual(await backend.upload(loi, content), { data: true, all: true });
      assert.strictEqual(await backend.storage.isEmpty('exp/sa/42/cwepr/1'), false);
    });

    it('should refuse unknown LOIs', async () => {
      await assert.rejects(freshBackend().upload('42.1001/ds/exp/sa/42/cwepr/9', content), (err: unknown) => {
        assert.ok(err instanceof LoiNotFoundError);
        assert.strictEqual(err.message, 'LOI does not exist.');
        return true;
      });
    });

    it('should refuse incomplete LOIs', async () => {
      await assert.rejects(freshBackend().upload('42.1001/ds/exp/sa/42/cwepr', content), InvalidLoiError);
    });

    it('should refuse LOIs with content', async () => {
      const backend = freshBackend();
      const loi = await backend.create('42.1001/ds/exp/sa/42/cwepr');
      await backend.upload(loi, content);
      await assert.rejects(backend.upload(loi, content), (err: unknown) => {
        assert.ok(err instanceof NotEmptyError);
        assert.strictEqual(err.message, 'Directory not empty');
        return true;
      });
    });

    it('should require content', async () => {
      const backend = freshBackend();
      const loi = await backend.create('42.1001/ds/exp/sa/42/cwepr');
      await assert.rejects(backend.upload(loi, Buffer.alloc(0)), MissingContentError);
    });
  });

  describe('update', () => {
    it('should replace existing content', async () => {
      const backend = freshBackend();
      const loi = await backend.create('42.1001/ds/exp/sa/42/cwepr');
      await backend.upload(loi, content);
      await writeFile(join(backend.storage.resolvePath('exp/sa/42/cwepr/1'), 'stray.txt'), 'left over');

      assert.deepStrictEqual(await backend.update(loi, content), { data: true, all: true });
      const names = (await readArchive(await backend.download(loi))).map(entry => entry.name).sort();
      assert.deepStrictEqual(names, ['MANIFEST.yaml', 'data.csv', 'data.info']);
    });

    it('should refuse unknown LOIs and missing content', async () => {
      const backend = freshBackend();
      await assert.rejects(backend.update('42.1001/ds/exp/sa/42/cwepr/1', content), LoiNotFoundError);
      const loi = await backend.create('42.1001/ds/exp/sa/42/cwepr');
      await assert.rejects(backend.update(loi, undefined), MissingContentError);
      assert.strictEqual(await backend.storage.exists('exp/sa/42/cwepr/1'), true);
    });
  });

  describe('download', () => {
    it('should return the stored archive', async () => {
      const backend = freshBackend();
      const loi = await backend.create('42.1001/ds/exp/sa/42/cwepr');
      await backend.upload(loi, content);

      const entries = await readArchive(await backend.download(loi));
      const data = entries.find(entry => entry.name === 'data.csv');
      assert.strictEqual(data?.data.toString('utf8'), '1,2,3\n');
    });

    it('should refuse empty LOIs', async () => {
      const backend = freshBackend();
      const loi = await backend.create('42.1001/ds/exp/sa/42/cwepr');
      await assert.rejects(backend.download(loi), /LOI does not have content\./);
    });

    it('should refuse unknown LOIs', async () => {
      await assert.rejects(freshBackend().download('42.1001/ds/exp/sa/42/cwepr/1'), LoiNotFoundError);
    });
  });

  it('should check integrity by LOI', async () => {
    const backend = freshBackend();
    const loi = await backend.create('42.1001/ds/exp/sa/42/cwepr');
    await backend.upload(loi, content);
    await writeFile(join(backend.storage.resolvePath('exp/sa/42/cwepr/1'), 'data.csv'), 'tampered');
    assert.deepStrictEqual(await backend.checkIntegrity(loi), { data: false, all: false });
  });
});
