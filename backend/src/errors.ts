export type ImportErrorCode = 'invalid_order_id' | 'missing_input_file' | 'store_failure';

export class ImportError extends Error {
  readonly code: ImportErrorCode;
  readonly details?: unknown;

  constructor(code: ImportErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ImportError';
    this.code = code;
    this.details = details;
  }
}

export function invalidOrderId(raw: string, rowNumber: number): ImportError {
  return new ImportError('invalid_order_id', `order id "${raw}" on row ${rowNumber} is not an integer`, {
    raw,
    rowNumber,
  });
}

export function missingInputFile(filePath: string, cause?: unknown): ImportError {
  return new ImportError('missing_input_file', `input file not found: ${filePath}`, { filePath, cause });
}

export function storeFailure(message: string, details?: unknown): ImportError {
  return new ImportError('store_failure', message, details);
}
