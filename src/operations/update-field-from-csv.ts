import fs from 'fs';
import Papa from 'papaparse';
import { CsvUpdateSettings } from '../config';
import { QaseClient } from '../services/qase';
import { stripHtmlTags } from '../transforms/html-tags';
import { RunOptions, TestCase } from '../types';
import { ConfigError } from '../utils/errors';
import { logger, serializeError } from '../utils/logger';
import { truncate } from '../utils/report';
import { findCustomFieldId } from './migrate-field';

export const CSV_ID_COLUMN = 'ID';

export interface CsvUpdateStats {
  totalCsvRows: number;
  matched: number;
  updated: number;
  notFound: number;
  errors: number;
}

/**
 * Map of test case code to the (HTML-stripped) value of `column`.
 * Rows without an ID are ignored; a later row wins over an earlier one.
 */
export function parseCsvData(text: string, column: string): Map<string, string> {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  const fields = parsed.meta.fields ?? [];
  if (!fields.includes(column)) {
    throw new ConfigError(`CSV column '${column}' not found in CSV file. Available columns: ${fields.join(', ')}`);
  }

  const rows = new Map<string, string>();
  for (const row of parsed.data) {
    const code = (row[CSV_ID_COLUMN] ?? '').trim();
    if (!code) continue;
    rows.set(code, stripHtmlTags((row[column] ?? '').trim()));
  }
  return rows;
}

export function loadCsvData(csvPath: string, column: string): Map<string, string> {
  if (!fs.existsSync(csvPath)) {
    throw new ConfigError(`CSV file not found: ${csvPath}`);
  }
  logger.info(`Reading CSV file: ${csvPath}`, { column });
  const rows = parseCsvData(fs.readFileSync(csvPath, 'utf-8'), column);
  logger.info(`Loaded ${rows.size} test cases from CSV`);
  return rows;
}

/**
 * Index test cases by code, both with and without the `C` prefix, so CSV
 * exports in either form match.
 */
export function indexTestCasesByCode(testCases: TestCase[]): Map<string, TestCase> {
  const index = new Map<string, TestCase>();
  for (const testCase of testCases) {
    const caseCode = testCase.code || (typeof testCase.case_code === 'string' ? testCase.case_code : '') || testCase.id;
    if (!caseCode) continue;
    const code = String(caseCode);
    index.set(code, testCase);
    index.set(code.startsWith('C') ? code.slice(1) : `C${code}`, testCase);
  }
  return index;
}

export function findByCode(index: Map<string, TestCase>, code: string): TestCase | undefined {
  return index.get(code) ?? index.get(code.startsWith('C') ? code.slice(1) : `C${code}`);
}

/**
 * Write a CSV column into a custom field, matching rows to test cases by
 * code. The CSV is the source of truth: matched cases are always written.
 */
export async function updateFieldFromCsv(
  client: QaseClient,
  csvData: Map<string, string>,
  settings: CsvUpdateSettings,
  options: RunOptions
): Promise<CsvUpdateStats> {
  const stats: CsvUpdateStats = { totalCsvRows: csvData.size, matched: 0, updated: 0, notFound: 0, errors: 0 };

  if (csvData.size === 0) {
    logger.warn('No data found in CSV file!');
    return stats;
  }

  let fieldId = settings.fieldId;
  if (fieldId !== undefined) {
    logger.info(`Using ${settings.fieldName} custom field ID: ${fieldId}`);
  } else {
    logger.info(`Fetching custom field definitions to find '${settings.fieldName}'...`);
    fieldId = findCustomFieldId(await client.listCustomFields(), settings.fieldName);
  }
  if (fieldId === undefined) {
    logger.error(`Cannot proceed without finding the '${settings.fieldName}' custom field.`);
    return stats;
  }

  const index = indexTestCasesByCode(await client.listTestCases());
  logger.info('Matching CSV data to Qase test cases...', {
    sampleCsvCodes: Array.from(csvData.keys()).slice(0, 5),
  });

  for (const [code, value] of csvData) {
    const testCase = findByCode(index, code);
    if (!testCase) {
      stats.notFound++;
      logger.debug(`[WARNING] Test case ${code} not found in Qase project`);
      continue;
    }

    stats.matched++;
    const label = `${code} (${testCase.id})`;
    const current = testCase.custom_fields?.find((field) => field.id === fieldId)?.value ?? '';
    logger.debug(`Case ${label} '${testCase.title || 'Untitled'}'`, {
      current: truncate(current),
      updating: truncate(value),
    });

    if (options.dryRun) {
      logger.info(`[DRY RUN] Would update case ${label} with ${settings.fieldName}`);
      stats.updated++;
      continue;
    }

    try {
      await client.updateTestCase(testCase.id, { custom_field: { [String(fieldId)]: value } });
      stats.updated++;
      logger.info(`[OK] Updated case ${label}`);
    } catch (error) {
      stats.errors++;
      logger.error(`[ERROR] Failed to update case ${label}`, { error: serializeError(error) });
    }
  }

  return stats;
}
