import {
  AccessConfigFileLatest,
  convertToAccessFileContents,
  loadAccessConfig,
  loadAccessConfigFile,
} from 'app/server/lib/accessConfig';
import {hashPassword} from 'app/server/lib/AccessGate';
import {FileConfig} from 'app/server/lib/config';
import {assert} from 'chai';
import * as fse from 'fs-extra';
import * as path from 'path';
import * as sinon from 'sinon';
import {createTestDir} from '../testUtils';

const DEFAULT_HASH = hashPassword('0000');
const STORED_HASH = hashPassword('2468');

describe('accessConfig', function() {
  describe('convertToAccessFileContents', function() {
    it('upgrades an empty object to the current version', function() {
      assert.deepEqual(convertToAccessFileContents({}), {version: "1"});
    });

    it('accepts a stored hash and keeps unknown properties', function() {
      assert.deepEqual<unknown>(convertToAccessFileContents({version: "1", passwordHash: STORED_HASH, note: "kept"}),
        {version: "1", passwordHash: STORED_HASH, note: "kept"});
    });

    it('rejects anything but an object', function() {
      assert.isNull(convertToAccessFileContents(null));
      assert.isNull(convertToAccessFileContents([]));
      assert.isNull(convertToAccessFileContents("1234"));
    });

    it('rejects unknown versions and malformed hashes', function() {
      assert.throws(() => convertToAccessFileContents({version: "2"}), 'unsupported version "2"');
      assert.throws(() => convertToAccessFileContents({passwordHash: "1234"}), /passwordHash/);
      assert.throws(() => convertToAccessFileContents({passwordHash: STORED_HASH.toUpperCase()}), /passwordHash/);
      assert.throws(() => convertToAccessFileContents({passwordHash: 42}), /passwordHash/);
    });
  });

  describe('loadAccessConfigFile', function() {
    let testDir: string;
    let cleanup: () => Promise<void>;
    let configPath: string;

    beforeEach(async function() {
      ({dir: testDir, cleanup} = await createTestDir());
      configPath = path.join(testDir, 'workbook-delta.json');
    });

    afterEach(async function() {
      await cleanup();
    });

    it('uses the default hash when no file exists', function() {
      const config = loadAccessConfigFile(DEFAULT_HASH, configPath);
      assert.equal(config.passwordHash.get(), DEFAULT_HASH);
    });

    it('reads a stored hash', async function() {
      await fse.writeJson(configPath, {version: "1", passwordHash: STORED_HASH});
      const config = loadAccessConfigFile(DEFAULT_HASH, configPath);
      assert.equal(config.passwordHash.get(), STORED_HASH);
    });

    it('writes a new hash to the file', async function() {
      const config = loadAccessConfigFile(DEFAULT_HASH, configPath);
      await config.passwordHash.set(STORED_HASH);
      assert.equal(config.passwordHash.get(), STORED_HASH);
      assert.deepEqual(await fse.readJson(configPath), {version: "1", passwordHash: STORED_HASH});
    });

    it('refuses an invalid file', async function() {
      await fse.writeJson(configPath, {version: "1", passwordHash: "plain"});
      assert.throws(() => loadAccessConfigFile(DEFAULT_HASH, configPath), /failed validation/);
    });

    it('keeps the hash in memory without a file', async function() {
      const config = loadAccessConfigFile(DEFAULT_HASH);
      await config.passwordHash.set(STORED_HASH);
      assert.equal(config.passwordHash.get(), STORED_HASH);
      assert.isFalse(await fse.pathExists(configPath));
    });
  });

  describe('loadAccessConfig', function() {
    afterEach(function() {
      sinon.restore();
    });

    it('reads and writes through a file config', async function() {
      const fileConfig = new FileConfig<AccessConfigFileLatest>("unused.json", {version: "1"});
      const persist = sinon.stub(fileConfig, 'persistToDisk').resolves();
      const config = loadAccessConfig(DEFAULT_HASH, fileConfig);
      assert.equal(config.passwordHash.get(), DEFAULT_HASH);
      await config.passwordHash.set(STORED_HASH);
      assert.equal(fileConfig.get('passwordHash'), STORED_HASH);
      assert.equal(persist.callCount, 1);
    });
  });
});
