import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigLoader } from '../../../src/config/config-loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/config-schema.js';
import { DEFAULT_LEARNING_CONFIG } from '../../../src/learning/types.js';

describe('ConfigLoader', () => {
  let dir: string;

  const writeConfig = (content: unknown) => {
    writeFileSync(join(dir, 'engine.json'), typeof content === 'string' ? content : JSON.stringify(content));
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'config-loader-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('uses defaults when there is no config file', async () => {
    const config = await new ConfigLoader(dir, {}).load();

    expect(config.learning).toEqual(DEFAULT_LEARNING_CONFIG);
    expect(config.storage).toEqual(DEFAULT_CONFIG.storage);
    expect(config.paths.config).toBe(dir);
  });

  it('merges file values over defaults section by section', async () => {
    writeConfig({
      version: 1,
      learning: { keywords: { learningRate: 0.2 }, sources: { knownSources: ['reuters.com'] } },
      storage: { busyTimeoutMs: 1000 },
      logging: { level: 'debug' },
    });

    const config = await new ConfigLoader(dir, {}).load();

    expect(config.learning.keywords).toEqual({ ...DEFAULT_LEARNING_CONFIG.keywords, learningRate: 0.2 });
    expect(config.learning.sources.knownSources).toEqual(['reuters.com']);
    expect(config.learning.patterns).toEqual(DEFAULT_LEARNING_CONFIG.patterns);
    expect(config.storage).toEqual({ dbPath: 'data/urgency.db', busyTimeoutMs: 1000 });
    expect(config.logging.level).toBe('debug');
  });

  it('does not mutate the defaults', async () => {
    writeConfig({ version: 1, storage: { dbPath: 'elsewhere.db' } });

    await new ConfigLoader(dir, {}).load();

    expect(DEFAULT_CONFIG.storage.dbPath).toBe('data/urgency.db');
  });

  it('rejects signal weights that sum above 1', async () => {
    writeConfig({ version: 1, learning: { prediction: { patternWeight: 0.7, keywordWeight: 0.4 } } });

    await expect(new ConfigLoader(dir, {}).load()).rejects.toThrow(
      'learning.prediction.patternWeight + keywordWeight must not exceed 1'
    );
  });

  it('rejects out-of-range values with the field path', async () => {
    writeConfig({ version: 1, learning: { keywords: { learningRate: 2 } } });

    await expect(new ConfigLoader(dir, {}).load()).rejects.toThrow('learning.keywords.learningRate');
  });

  it('rejects a file that is not JSON', async () => {
    writeConfig('{ version: 1');

    await expect(new ConfigLoader(dir, {}).load()).rejects.toThrow(/not valid JSON/);
  });

  it('warns about a newer file version', async () => {
    writeConfig({ version: 7 });
    const loader = new ConfigLoader(dir, {});

    await loader.load();

    expect(loader.getWarnings()).toEqual(['Config file version (7) is newer than supported (1)']);
  });

  it('lets the environment override paths and level', async () => {
    writeConfig({ version: 1, logging: { level: 'warn' } });

    const config = await new ConfigLoader(dir, { DATA_PATH: '/srv/urgency', LOG_LEVEL: 'error' }).load();

    expect(config.logging.level).toBe('error');
    expect(config.paths.locks).toBe(join('/srv/urgency', 'locks'));
    expect(config.storage.dbPath).toBe(join('/srv/urgency', 'urgency.db'));
  });

  it('prefers URGENCY_DB_PATH over DATA_PATH and ignores unknown levels', async () => {
    const config = await new ConfigLoader(dir, {
      DATA_PATH: '/srv/urgency',
      URGENCY_DB_PATH: '/tmp/custom.db',
      LOG_LEVEL: 'verbose',
    }).load();

    expect(config.storage.dbPath).toBe('/tmp/custom.db');
    expect(config.logging.level).toBe(DEFAULT_CONFIG.logging.level);
  });
});
