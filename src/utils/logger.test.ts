import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createLogger, setLogFile, setLogLevel } from './logger';

describe('setLogFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sales-logger-'));
  });

  afterEach(() => {
    setLogFile(null);
    setLogLevel('silent');
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends JSON lines from module loggers to the file', () => {
    const path = join(dir, 'logs', 'pipeline.log');
    const log = createLogger('pipeline-test');
    setLogLevel('info');
    setLogFile(path);

    log.info({ rows: 3 }, 'Loaded sales data');
    log.debug('below the level');
    setLogFile(null);

    const lines = readFileSync(path, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ name: 'pipeline-test', rows: 3, msg: 'Loaded sales data' });
  });

  it('writes nothing while the level is silent', () => {
    const path = join(dir, 'quiet.log');
    setLogLevel('silent');
    setLogFile(path);
    createLogger('quiet').error('not written');
    setLogFile(null);

    expect(existsSync(path) ? readFileSync(path, 'utf-8') : '').toBe('');
  });
});
