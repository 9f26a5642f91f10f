/**
 * Update a custom field from a CSV export with an `ID` column (case code,
 * with or without the `C` prefix) and a value column.
 *
 * Usage: npx tsx scripts/update-field-from-csv.ts export.csv [--field-name Postconditions] [--csv-column Notes] [--dry-run]
 */

import { CommonOptions, createContext, createScriptCommand, handleFatal, parsePositiveInt } from '../src/cli';
import { resolveCsvUpdateSettings } from '../src/config';
import { loadCsvData, updateFieldFromCsv } from '../src/operations/update-field-from-csv';
import { formatBanner, formatSummary } from '../src/utils/report';

interface UpdateFromCsvOptions extends CommonOptions {
  fieldName?: string;
  fieldId?: number;
  csvColumn?: string;
}

const program = createScriptCommand('update-field-from-csv', 'Update custom field in Qase test cases from CSV file')
  .argument('<csv-file>', 'path to CSV file with ID and field value columns')
  .option('--field-name <name>', "custom field to update (default: 'csv_field_name' in config or Postconditions)")
  .option('--field-id <id>', 'custom field ID (overrides name search)', parsePositiveInt)
  .option('--csv-column <name>', 'CSV column to read (defaults to the field name)');

async function main() {
  program.parse();
  const [csvFile] = program.args;
  const options = program.opts<UpdateFromCsvOptions>();
  const { config, client, run } = createContext(options);
  const settings = resolveCsvUpdateSettings(options, config.file);

  console.log(
    formatBanner('Qase Custom Field CSV Updater', run, [
      ['CSV file', csvFile],
      ['Field name', settings.fieldName],
      ['CSV column', settings.csvColumn],
    ])
  );

  const csvData = loadCsvData(csvFile, settings.csvColumn);
  const stats = await updateFieldFromCsv(client, csvData, settings, run);

  console.log(
    formatSummary([
      ['Total CSV rows', stats.totalCsvRows],
      ['Matched test cases', stats.matched],
      ['Updated', stats.updated],
      ['Not found in Qase', stats.notFound],
      ['Errors', stats.errors],
    ])
  );
}

main().catch(handleFatal);
