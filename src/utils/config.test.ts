import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, describeConfig } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sales-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  // ===========================================================================
  // Defaults and environment
  // ===========================================================================

  it('falls back to built-in defaults', () => {
    expect(loadConfig({ env: {} })).toEqual({
      logLevel: 'info',
      dataFile: 'data/raw/sales_data.csv',
      outputDir: 'output',
      columns: { date: 'date', productId: 'model', unitsSold: 'units_sold', avgPrice: 'avg_price' },
      topN: 5,
    });
  });

  it('applies environment overrides', () => {
    const config = loadConfig({
      env: { SALES_TOP_N: '3', LOG_LEVEL: 'DEBUG', SALES_PRODUCT_COLUMN: 'sku', SALES_DATA_FILE: 'in.csv' },
    });
    expect(config.topN).toBe(3);
    expect(config.logLevel).toBe('debug');
    expect(config.dataFile).toBe('in.csv');
    expect(config.columns).toEqual({ date: 'date', productId: 'sku', unitsSold: 'units_sold', avgPrice: 'avg_price' });
  });

  it('ignores empty environment variables', () => {
    expect(loadConfig({ env: { SALES_OUTPUT_DIR: '' } }).outputDir).toBe('output');
  });

  // ===========================================================================
  // Config file
  // ===========================================================================

  it('layers the environment over the config file', () => {
    const path = writeConfig('config.json', JSON.stringify({ topN: 7, outputDir: 'reports', columns: { date: 'day' } }));
    const config = loadConfig({ configPath: path, env: { SALES_OUTPUT_DIR: 'env-out' } });

    expect(config.topN).toBe(7);
    expect(config.outputDir).toBe('env-out');
    expect(config.columns).toEqual({ date: 'day', productId: 'model', unitsSold: 'units_sold', avgPrice: 'avg_price' });
  });

  it('finds the config file through SALES_METRICS_CONFIG', () => {
    const path = writeConfig('env-config.json', JSON.stringify({ dataFile: 'from-file.csv' }));
    expect(loadConfig({ env: { SALES_METRICS_CONFIG: path } }).dataFile).toBe('from-file.csv');
  });

  it('skips prototype keys in the config file', () => {
    const path = writeConfig('proto.json', '{"__proto__": {"topN": 99}, "topN": 2}');
    expect(loadConfig({ configPath: path, env: {} }).topN).toBe(2);
    expect(Object.prototype).not.toHaveProperty('topN');
  });

  // ===========================================================================
  // Errors
  // ===========================================================================

  it('rejects a missing config file', () => {
    expect(() => loadConfig({ configPath: join(dir, 'nope.json'), env: {} })).toThrow(
      `Config file not found: ${join(dir, 'nope.json')}`,
    );
  });

  it('rejects malformed JSON', () => {
    const path = writeConfig('bad.json', '{ topN: ');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(ConfigError);
  });

  it('rejects a config file that is not an object', () => {
    const path = writeConfig('list.json', '[1, 2]');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(`Config file ${path} must contain a JSON object`);
  });

  it('reports schema issues with their paths', () => {
    try {
      loadConfig({ env: { SALES_TOP_N: '0' } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe('CONFIG');
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^topN: /);
      }
    }
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ env: { LOG_LEVEL: 'verbose' } })).toThrow(ConfigError);
  });
});

describe('describeConfig', () => {
  it('returns a copy of the settings', () => {
    const config = loadConfig({ env: {} });
    const described = describeConfig(config);
    expect(described).toEqual({
      dataFile: 'data/raw/sales_data.csv',
      outputDir: 'output',
      columns: { date: 'date', productId: 'model', unitsSold: 'units_sold', avgPrice: 'avg_price' },
      topN: 5,
      logLevel: 'info',
    });
    expect(described.columns).not.toBe(config.columns);
  });
});
