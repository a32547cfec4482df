import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('config', () => {
  it('should fall back to defaults', () => {
    assert.deepStrictEqual(loadConfig({}), {
      rootDirectory: 'datasafe_root',
      manifestFilename: 'MANIFEST.yaml',
      checksumAlgorithm: 'md5',
      port: 8000,
      serverUrl: 'http://127.0.0.1:8000',
      logLevel: 'info',
    });
  });

  it('should read the environment', () => {
    const config = loadConfig({
      DATASAFE_ROOT: '/srv/datasafe',
      DATASAFE_MANIFEST_FILENAME: 'MANIFEST.yml',
      DATASAFE_CHECKSUM_ALGORITHM: 'sha256',
      DATASAFE_PORT: '9000',
      DATASAFE_URL: 'http://datasafe.example:9000',
      LOG_LEVEL: 'debug',
    });
    assert.strictEqual(config.rootDirectory, '/srv/datasafe');
    assert.strictEqual(config.manifestFilename, 'MANIFEST.yml');
    assert.strictEqual(config.checksumAlgorithm, 'sha256');
    assert.strictEqual(config.port, 9000);
    assert.strictEqual(config.serverUrl, 'http://datasafe.example:9000');
    assert.strictEqual(config.logLevel, 'debug');
  });

  it('should derive the server URL from the port', () => {
    assert.strictEqual(loadConfig({ DATASAFE_PORT: '8123' }).serverUrl, 'http://127.0.0.1:8123');
  });

  it('should treat empty values as unset', () => {
    assert.strictEqual(loadConfig({ DATASAFE_ROOT: '' }).rootDirectory, 'datasafe_root');
  });

  it('should be frozen', () => {
    assert.strictEqual(Object.isFrozen(loadConfig({})), true);
  });

  it('should name the offending variable', () => {
    assert.throws(
      () => loadConfig({ DATASAFE_PORT: 'eighty' }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigurationError);
        assert.deepStrictEqual(err.details, { variable: 'DATASAFE_PORT' });
        assert.ok(err.message.startsWith('Invalid DATASAFE_PORT: '));
        return true;
      }
    );
    assert.throws(() => loadConfig({ DATASAFE_MANIFEST_FILENAME: 'sub/MANIFEST.yaml' }), /Invalid DATASAFE_MANIFEST_FILENAME: must be a plain file name/);
    assert.throws(() => loadConfig({ LOG_LEVEL: 'loud' }), ConfigurationError);
  });
});
