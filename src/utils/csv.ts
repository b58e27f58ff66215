/**
 * CSV Utilities for provider transaction exports
 *
 * Streams an uploaded CSV through csv-parser and turns each row into a
 * transaction input for the ingestion gateway. Field-level validation
 * (currency code, amount precision, provider) stays with the gateway;
 * this module only reshapes and cleans the raw text.
 */

import { createReadStream } from 'fs';
import csvParser from 'csv-parser';

// ============================================
// Types
// ============================================

/**
 * Raw CSV row from a provider export
 */
export interface ProviderTransactionCsvRow {
  provider: string;
  external_id: string;
  amount: string;
  currency: string;
  transaction_date: string;
  description?: string;
  reference?: string;
}

/**
 * Cleaned row, still unvalidated
 */
export interface CsvTransactionInput {
  provider: string;
  externalId: string;
  amount: string;
  currency: string;
  transactionDate: string;
  description: string | null;
  reference: string | null;
}

export type RowParseResult =
  | { success: true; data: CsvTransactionInput; rowNumber: number }
  | { success: false; error: string; rowNumber: number };

export interface CsvStats {
  total: number;
  valid: number;
  invalid: number;
}

const REQUIRED_COLUMNS = [
  'provider',
  'external_id',
  'amount',
  'currency',
  'transaction_date',
] as const;

// ============================================
// Validation Functions
// ============================================

/**
 * Validates that all required columns are present in the CSV headers
 */
export function validateCsvHeaders(headers: string[]): { valid: boolean; missing: string[] } {
  const normalizedHeaders = headers.map((h) => h.toLowerCase().trim());
  const missing = REQUIRED_COLUMNS.filter((col) => !normalizedHeaders.includes(col));

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Normalizes a CSV date to YYYY-MM-DD.
 * Supports: YYYY-MM-DD, MM/DD/YYYY
 */
export function parseTransactionDate(value: string | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }

  if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) {
    return trimmed;
  }

  const usMatch = trimmed.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (usMatch) {
    const [, month, day, year] = usMatch;
    return `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
  }

  return null;
}

/**
 * Strips currency symbols, thousands separators and whitespace.
 * Handles: "1234.56", "$1,234.56", " 500 "
 * Returns the cleaned decimal text, or null if nothing numeric remains.
 */
export function parseAmount(value: string | undefined): string | null {
  if (!value || value.trim() === '') {
    return null;
  }

  const cleaned = value.replace(/[$€£,\s]/g, '');

  return /^-?\d+(\.\d+)?$/.test(cleaned) ? cleaned : null;
}

/**
 * Parses a single CSV row into gateway input
 */
export function parseRow(row: ProviderTransactionCsvRow, rowNumber: number): RowParseResult {
  const transactionDate = parseTransactionDate(row.transaction_date);
  if (!transactionDate) {
    return {
      success: false,
      error: `Invalid transaction_date: "${row.transaction_date}"`,
      rowNumber,
    };
  }

  const amount = parseAmount(row.amount);
  if (amount === null) {
    return {
      success: false,
      error: `Invalid amount: "${row.amount}"`,
      rowNumber,
    };
  }

  const externalId = (row.external_id ?? '').trim();
  if (!externalId) {
    return {
      success: false,
      error: 'Missing or empty external_id',
      rowNumber,
    };
  }

  return {
    success: true,
    data: {
      provider: (row.provider ?? '').trim().toLowerCase(),
      externalId,
      amount,
      currency: (row.currency ?? '').trim(),
      transactionDate,
      description: row.description?.trim() || null,
      reference: row.reference?.trim() || null,
    },
    rowNumber,
  };
}

// ============================================
// Streaming CSV Parser
// ============================================

export interface ParsedCsvFile {
  rows: Array<{ rowNumber: number; input: CsvTransactionInput }>;
  errors: Array<{ rowNumber: number; error: string }>;
  stats: CsvStats;
}

const missingColumnsError = (missing: string[]): Error =>
  new Error(`Missing required columns: ${missing.join(', ')}`);

/**
 * Streams a provider export row by row. Rows are numbered from 1, header excluded.
 * Throws before the first row when required columns are missing.
 */
export async function* readCsvRows(filePath: string): AsyncGenerator<RowParseResult> {
  let missing: string[] = [];

  const parser = csvParser({
    mapHeaders: ({ header }) => header.toLowerCase().trim(),
  });
  parser.once('headers', (headers: string[]) => {
    missing = validateCsvHeaders(headers).missing;
  });

  // pipe() does not forward source errors
  const source = createReadStream(filePath);
  source.once('error', (error) => parser.destroy(error));

  let rowNumber = 0;
  for await (const row of source.pipe(parser)) {
    if (missing.length > 0) {
      throw missingColumnsError(missing);
    }
    rowNumber++;
    yield parseRow(row, rowNumber);
  }

  if (missing.length > 0) {
    throw missingColumnsError(missing);
  }
}

/**
 * Parses a whole CSV file into memory
 */
export async function parseCsvFile(filePath: string): Promise<ParsedCsvFile> {
  const parsed: ParsedCsvFile = { rows: [], errors: [], stats: { total: 0, valid: 0, invalid: 0 } };

  for await (const result of readCsvRows(filePath)) {
    parsed.stats.total++;
    if (result.success) {
      parsed.stats.valid++;
      parsed.rows.push({ rowNumber: result.rowNumber, input: result.data });
    } else {
      parsed.stats.invalid++;
      parsed.errors.push({ rowNumber: result.rowNumber, error: result.error });
    }
  }

  return parsed;
}
