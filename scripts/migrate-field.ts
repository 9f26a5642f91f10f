/**
 * Move the content of a system field into a custom field, clearing the
 * system field afterwards.
 *
 * Usage: npx tsx scripts/migrate-field.ts --source-field Preconditions \
 *          --destination-field "Legacy Preconditions" [--destination-field-id 12] [--dry-run]
 */

import { CommonOptions, createContext, createScriptCommand, handleFatal, parsePositiveInt } from '../src/cli';
import { resolveFieldMigrationSettings } from '../src/config';
import { migrateField } from '../src/operations/migrate-field';
import { formatBanner, formatSummary } from '../src/utils/report';

interface MigrateFieldOptions extends CommonOptions {
  sourceField?: string;
  destinationField?: string;
  destinationFieldId?: number;
}

const program = createScriptCommand(
  'migrate-field',
  'Migrate field content from system fields to custom fields in Qase test cases'
)
  .option('--source-field <name>', "name of the source system field (or 'source_field' in config)")
  .option('--destination-field <name>', "name of the destination custom field (or 'destination_field' in config)")
  .option('--destination-field-id <id>', 'custom field ID for the destination (skips the name search)', parsePositiveInt);

async function main() {
  program.parse();
  const options = program.opts<MigrateFieldOptions>();
  const { config, client, run } = createContext(options);
  const settings = resolveFieldMigrationSettings(options, config.file);

  console.log(
    formatBanner('Qase Field Migration', run, [
      ['Source field', settings.sourceField],
      ['Destination field', settings.destinationField],
    ])
  );

  const stats = await migrateField(client, settings, run);

  const notes =
    stats.needsMigration === 0 && stats.total > 0
      ? [`[INFO] All test cases are already migrated! No ${settings.sourceField} to migrate.`]
      : [];
  console.log(
    formatSummary(
      [
        ['Total test cases', stats.total],
        ['Cases needing migration', stats.needsMigration],
        ['Cases migrated', stats.migrated],
        ['Cases skipped (already migrated)', stats.skipped],
        ['Errors', stats.errors],
      ],
      notes
    )
  );
}

main().catch(handleFatal);
