import { createReadStream, promises as fsp } from 'node:fs';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { missingInputFile } from '../errors.js';

export type CsvRow = Record<string, string>;

/** A named column of a row: trimmed, empty when the column is missing. */
export const csvCell = z
  .string()
  .optional()
  .transform((value) => (value ?? '').trim());

const recordSchema = z.record(z.string(), z.string());

/**
 * Streams a header-driven CSV export one record at a time. A leading BOM is
 * dropped, short rows are accepted (missing cells are simply absent).
 */
export async function* readCsvRows(filePath: string): AsyncGenerator<CsvRow> {
  try {
    await fsp.access(filePath);
  } catch (error) {
    throw missingInputFile(filePath, error);
  }

  const parser = createReadStream(filePath, { encoding: 'utf8' }).pipe(
    parse({
      bom: true,
      columns: true,
      relax_column_count: true,
      skip_empty_lines: true,
    })
  );

  for await (const record of parser) {
    yield recordSchema.parse(record);
  }
}
