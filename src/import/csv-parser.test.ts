import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseSalesCsv, detectDelimiter, parseFields } from './csv-parser';
import { readSalesSource } from './index';
import { SourceReadError } from '../utils/errors';

// =============================================================================
// detectDelimiter
// =============================================================================

describe('detectDelimiter', () => {
  it('picks comma for plain CSV', () => {
    expect(detectDelimiter('a,b,c\n1,2,3')).toBe(',');
  });

  it('picks tab when tabs are the only separator', () => {
    expect(detectDelimiter('a\tb\n1\t2')).toBe('\t');
  });

  it('ignores commas inside quotes', () => {
    expect(detectDelimiter('a|b\n"1,5"|2')).toBe('|');
  });

  it('prefers a delimiter that splits every line the same way', () => {
    // comma: 0 and 2 per line (avg 1); pipe: 1 and 1 (avg 1, +10 for consistency)
    expect(detectDelimiter('a|b\nx,y,z|w')).toBe('|');
  });

  it('defaults to comma for empty text', () => {
    expect(detectDelimiter('')).toBe(',');
  });
});

// =============================================================================
// parseFields
// =============================================================================

describe('parseFields', () => {
  it('splits on the delimiter and trims', () => {
    expect(parseFields(' a , b ,c', ',')).toEqual(['a', 'b', 'c']);
  });

  it('keeps delimiters and escaped quotes inside quoted fields', () => {
    expect(parseFields('"Sedan, S5","The ""S"" line",3', ',')).toEqual(['Sedan, S5', 'The "S" line', '3']);
  });
});

// =============================================================================
// parseSalesCsv
// =============================================================================

describe('parseSalesCsv', () => {
  it('parses the header and rows as strings', () => {
    const table = parseSalesCsv('date,model,units_sold,avg_price\n2022-01-01,Sedan S5,120,31500.5\n');
    expect(table.columns).toEqual(['date', 'model', 'units_sold', 'avg_price']);
    expect(table.rows).toEqual([{ date: '2022-01-01', model: 'Sedan S5', units_sold: '120', avg_price: '31500.5' }]);
  });

  it('strips a BOM and handles CRLF line endings', () => {
    const table = parseSalesCsv('\uFEFFdate,model\r\n2022-01-01,A\r\n2022-02-01,B\r\n');
    expect(table.columns).toEqual(['date', 'model']);
    expect(table.rows).toEqual([
      { date: '2022-01-01', model: 'A' },
      { date: '2022-02-01', model: 'B' },
    ]);
  });

  it('keeps quoted commas as part of the value', () => {
    const table = parseSalesCsv('date,model,units_sold,avg_price\n2022-01-01,"Sedan, S5",5,"1,200.50"');
    expect(table.rows[0]).toEqual({ date: '2022-01-01', model: 'Sedan, S5', units_sold: '5', avg_price: '1,200.50' });
  });

  it('keeps newlines inside quoted fields', () => {
    const table = parseSalesCsv('date,model\n2022-01-01,"Line\nTwo"\n');
    expect(table.rows).toEqual([{ date: '2022-01-01', model: 'Line\nTwo' }]);
  });

  it('reads tab-separated text', () => {
    const table = parseSalesCsv('date\tmodel\n2022-01-01\tA');
    expect(table.rows).toEqual([{ date: '2022-01-01', model: 'A' }]);
  });

  it('honors an explicit delimiter', () => {
    const table = parseSalesCsv('a|b\n1|2', { delimiter: 'pipe' });
    expect(table.columns).toEqual(['a', 'b']);
    expect(table.rows).toEqual([{ a: '1', b: '2' }]);
  });

  it('turns empty cells into null and pads short rows', () => {
    const table = parseSalesCsv('a,b,c\n1,,3\n4,5');
    expect(table.rows).toEqual([
      { a: '1', b: null, c: '3' },
      { a: '4', b: '5', c: null },
    ]);
  });

  it('skips blank lines', () => {
    const table = parseSalesCsv('a,b\n\n1,2\n   \n3,4\n');
    expect(table.rows).toHaveLength(2);
  });

  it('returns an empty table for blank text', () => {
    expect(parseSalesCsv('')).toEqual({ columns: [], rows: [] });
    expect(parseSalesCsv('\n  \n')).toEqual({ columns: [], rows: [] });
  });
});

// =============================================================================
// readSalesSource
// =============================================================================

describe('readSalesSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sales-import-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads and parses a file', () => {
    const path = join(dir, 'sales.csv');
    writeFileSync(path, 'date,model,units_sold,avg_price\n2022-01-01,A,1,2\n', 'utf-8');
    const table = readSalesSource(path);
    expect(table.columns).toEqual(['date', 'model', 'units_sold', 'avg_price']);
    expect(table.rows).toHaveLength(1);
  });

  it('throws SourceReadError for a missing file', () => {
    const path = join(dir, 'missing.csv');
    expect(() => readSalesSource(path)).toThrow(SourceReadError);
  });

  it('throws SourceReadError for a file without a header row', () => {
    const path = join(dir, 'empty.csv');
    writeFileSync(path, '\n', 'utf-8');
    expect(() => readSalesSource(path)).toThrow(`Data file ${path} has no header row`);
  });

  it('keeps the path on the error', () => {
    const path = join(dir, 'missing.csv');
    try {
      readSalesSource(path);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SourceReadError);
      if (err instanceof SourceReadError) {
        expect(err.path).toBe(path);
        expect(err.code).toBe('SOURCE_READ');
      }
    }
  });
});
