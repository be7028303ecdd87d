import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { DEFAULT_CONFIG, configFileName, loadConfig, pickConfig } from '../config.js';

const { describe, it, beforeEach, afterEach } = test;

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdrecords-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('uses defaults without a config file', async () => {
    assert.deepStrictEqual(await loadConfig(tempDir, {}), DEFAULT_CONFIG);
  });

  it('merges recognised keys from the file', async () => {
    fs.writeFileSync(
      path.join(tempDir, 'mdrecords.config.json'),
      JSON.stringify({ inputDir: 'records', port: 8080, logRequests: 'yes', unknown: true })
    );

    const config = await loadConfig(tempDir, {});

    assert.deepStrictEqual(config, { ...DEFAULT_CONFIG, inputDir: 'records', port: 8080 });
  });

  it('picks the file named by MDRECORDS_CONFIG', async () => {
    fs.writeFileSync(path.join(tempDir, 'mdrecords.config.ci.json'), JSON.stringify({ wikiDir: 'out/wiki' }));

    const config = await loadConfig(tempDir, { MDRECORDS_CONFIG: 'ci' });

    assert.strictEqual(config.wikiDir, 'out/wiki');
  });

  it('lets the environment override the file', async () => {
    fs.writeFileSync(path.join(tempDir, 'mdrecords.config.json'), JSON.stringify({ inputDir: 'records', port: 8080 }));

    const config = await loadConfig(tempDir, { PORT: '9090', MDRECORDS_INPUT: 'adr' });

    assert.strictEqual(config.port, 9090);
    assert.strictEqual(config.inputDir, 'adr');
  });

  it('ignores a PORT that is not a positive integer', async () => {
    const config = await loadConfig(tempDir, { PORT: 'eighty' });

    assert.strictEqual(config.port, 3000);
  });

  it('rejects a file that is not JSON', async () => {
    fs.writeFileSync(path.join(tempDir, 'mdrecords.config.json'), '{ not json');

    await assert.rejects(loadConfig(tempDir, {}));
  });
});

describe('configFileName', () => {
  it('defaults to mdrecords.config.json', () => {
    assert.strictEqual(configFileName({}), 'mdrecords.config.json');
    assert.strictEqual(configFileName({ MDRECORDS_CONFIG: 'prod' }), 'mdrecords.config.prod.json');
  });
});

describe('pickConfig', () => {
  it('returns nothing for values that are not objects', () => {
    assert.deepStrictEqual(pickConfig(null), {});
    assert.deepStrictEqual(pickConfig([1, 2]), {});
    assert.deepStrictEqual(pickConfig({ pagesUrl: 'https://example.test' }), { pagesUrl: 'https://example.test' });
  });
});
