import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { CONFIG_FILE_NAME, applySettings, defaultConfig, loadConfig } from '../config.js';

const { describe, it, beforeEach, afterEach, mock } = test;

describe('loadConfig', () => {
  let tempDir: string;
  let warnings: string[];

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fmq-config-'));
    warnings = [];
    mock.method(console, 'warn', (message: string) => { warnings.push(message); });
  });

  afterEach(() => {
    mock.restoreAll();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should use defaults without a file or environment', async () => {
    const config = await loadConfig(tempDir, {});

    assert.deepStrictEqual(config, defaultConfig());
    assert.ok(config.concurrency >= 1);
    assert.deepStrictEqual(config.extensions, ['.md']);
    assert.strictEqual(config.port, 4000);
    assert.deepStrictEqual(warnings, []);
  });

  it('should read the config file', async () => {
    fs.writeFileSync(path.join(tempDir, CONFIG_FILE_NAME), JSON.stringify({
      concurrency: 2,
      extensions: ['md', '.markdown'],
      lenient: false
    }));

    const config = await loadConfig(tempDir, {});

    assert.strictEqual(config.concurrency, 2);
    assert.deepStrictEqual(config.extensions, ['.md', '.markdown']);
    assert.strictEqual(config.lenient, false);
  });

  it('should let the environment override the file', async () => {
    fs.writeFileSync(path.join(tempDir, CONFIG_FILE_NAME), JSON.stringify({ port: 5000 }));

    const config = await loadConfig(tempDir, { FMQ_PORT: '6000', FMQ_EXTENSIONS: 'md, txt' });

    assert.strictEqual(config.port, 6000);
    assert.deepStrictEqual(config.extensions, ['.md', '.txt']);
  });

  it('should warn about and ignore invalid values', async () => {
    const config = await loadConfig(tempDir, { FMQ_CONCURRENCY: 'many' });

    assert.strictEqual(config.concurrency, defaultConfig().concurrency);
    assert.deepStrictEqual(warnings, ['Ignoring invalid concurrency in environment: many']);
  });

  it('should reject a file that is not an object', async () => {
    fs.writeFileSync(path.join(tempDir, CONFIG_FILE_NAME), '[1, 2]');

    const config = await loadConfig(tempDir, {});

    assert.deepStrictEqual(config, defaultConfig());
    assert.deepStrictEqual(warnings, [`${CONFIG_FILE_NAME} must contain a JSON object, using defaults`]);
  });

  it('should keep the defaults when the file is not valid JSON', async () => {
    fs.writeFileSync(path.join(tempDir, CONFIG_FILE_NAME), '{ not json');

    const config = await loadConfig(tempDir, { FMQ_PORT: '7000' });

    assert.deepStrictEqual(config, { ...defaultConfig(), port: 7000 });
    assert.strictEqual(warnings.length, 1);
    assert.ok(warnings[0].startsWith(`Could not read ${CONFIG_FILE_NAME}, using defaults: `));
  });
});

describe('applySettings', () => {
  it('should warn about unknown keys and wrong types', () => {
    const warnings: string[] = [];
    mock.method(console, 'warn', (message: string) => { warnings.push(message); });

    const config = applySettings(defaultConfig(), { colour: 'blue', lenient: 'yes', port: 0 }, 'test');
    mock.restoreAll();

    assert.strictEqual(config.lenient, true);
    assert.strictEqual(config.port, 4000);
    assert.deepStrictEqual(warnings, [
      'Unknown setting "colour" in test',
      'Ignoring invalid lenient in test: yes',
      'Ignoring invalid port in test: 0'
    ]);
  });
});
