import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ImportError } from '../src/errors.js';
import { readCsvRows, type CsvRow } from '../src/services/csv-source.js';

async function collect(rows: AsyncIterable<CsvRow>): Promise<CsvRow[]> {
  const result: CsvRow[] = [];
  for await (const row of rows) result.push(row);
  return result;
}

describe('readCsvRows', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'studio-import-'));
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it('reads rows by header name and drops a leading BOM', async () => {
    const file = path.join(dir, 'contacts.csv');
    await fsp.writeFile(file, '\uFEFFContact ID,Last Name,Email\n501,Doe,jane@example.com\n', 'utf8');

    await expect(collect(readCsvRows(file))).resolves.toEqual([
      { 'Contact ID': '501', 'Last Name': 'Doe', Email: 'jane@example.com' },
    ]);
  });

  it('keeps quoted multi-line cells intact', async () => {
    const file = path.join(dir, 'orders.csv');
    await fsp.writeFile(file, 'Order ID,Items Ordered\n9001,"8x10 Print\nMug"\n', 'utf8');

    const rows = await collect(readCsvRows(file));

    expect(rows).toHaveLength(1);
    expect(rows[0]['Items Ordered']).toBe('8x10 Print\nMug');
  });

  it('accepts rows with fewer cells than headers', async () => {
    const file = path.join(dir, 'short.csv');
    await fsp.writeFile(file, 'Contact ID,Last Name,Email\n502,Roe\n', 'utf8');

    const rows = await collect(readCsvRows(file));

    expect(rows[0]['Contact ID']).toBe('502');
    expect(rows[0]['Last Name']).toBe('Roe');
    expect(rows[0].Email ?? '').toBe('');
  });

  it('fails with a missing_input_file error when the file does not exist', async () => {
    const run = collect(readCsvRows(path.join(dir, 'absent.csv')));

    await expect(run).rejects.toBeInstanceOf(ImportError);
    await expect(run).rejects.toMatchObject({ code: 'missing_input_file' });
  });
});
