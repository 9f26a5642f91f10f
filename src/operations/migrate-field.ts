import { FieldMigrationSettings } from '../config';
import { QaseClient } from '../services/qase';
import { CustomField, RunOptions, SystemField, TestCase, TestCaseUpdate } from '../types';
import { logger, serializeError } from '../utils/logger';
import { ProgressBar } from '../utils/progress';
import { truncate } from '../utils/report';
import { describeCase } from './text-fix';

export interface FieldMigrationStats {
  total: number;
  needsMigration: number;
  migrated: number;
  errors: number;
  skipped: number;
}

function emptyStats(): FieldMigrationStats {
  return { total: 0, needsMigration: 0, migrated: 0, errors: 0, skipped: 0 };
}

/**
 * System field slug for a name given as title (exact, then any case) or as slug.
 */
export function findSystemFieldSlug(fields: SystemField[], name: string): string | undefined {
  const lower = name.toLowerCase();
  const match =
    fields.find((field) => field.title === name) ??
    fields.find((field) => (field.title ?? '').toLowerCase() === lower || (field.slug ?? '').toLowerCase() === lower);
  return match?.slug;
}

/**
 * Custom field ID by title: exact match first, then case-insensitive.
 */
export function findCustomFieldId(fields: CustomField[], names: string | string[]): number | undefined {
  const candidates = Array.isArray(names) ? names : [names];
  for (const name of candidates) {
    const exact = fields.find((field) => field.title === name && field.id);
    if (exact) return exact.id;
  }
  for (const name of candidates) {
    const lower = name.toLowerCase();
    const loose = fields.find((field) => (field.title ?? '').toLowerCase() === lower && field.id);
    if (loose) return loose.id;
  }
  return undefined;
}

function sourceText(testCase: TestCase, slug: string): string {
  const value = testCase[slug];
  return typeof value === 'string' ? value : '';
}

/**
 * Copy the source value into the custom field and clear the source.
 * Returns `null` when the source is blank.
 */
export function buildMigrationUpdate(testCase: TestCase, sourceSlug: string, destinationFieldId: number): TestCaseUpdate | null {
  const value = sourceText(testCase, sourceSlug);
  if (!value.trim()) return null;
  return {
    custom_field: { [String(destinationFieldId)]: value },
    [sourceSlug]: '',
  };
}

async function resolveDestinationFieldId(
  client: QaseClient,
  name: string,
  configuredId: number | undefined
): Promise<number | undefined> {
  if (configuredId !== undefined) {
    logger.info(`Using ${name} custom field ID from config: ${configuredId}`);
    return configuredId;
  }

  logger.info(`Fetching custom field definitions to find '${name}'...`);
  const fieldId = findCustomFieldId(await client.listCustomFields(), name);
  if (fieldId !== undefined) {
    logger.info(`Found '${name}' custom field with ID: ${fieldId}`);
  }
  return fieldId;
}

/**
 * Move the content of a system field (e.g. Pre-conditions) into a custom field
 * for every test case in the project.
 */
export async function migrateField(
  client: QaseClient,
  settings: FieldMigrationSettings,
  options: RunOptions
): Promise<FieldMigrationStats> {
  const { sourceField, destinationField } = settings;

  logger.info(`Fetching system field definitions to find '${sourceField}'...`);
  const sourceSlug = findSystemFieldSlug(await client.listSystemFields(), sourceField);
  if (!sourceSlug) {
    logger.error(`Cannot proceed without finding the '${sourceField}' system field.`);
    return emptyStats();
  }
  logger.info(`Found '${sourceField}' system field with slug: ${sourceSlug}`);

  const destinationId = await resolveDestinationFieldId(client, destinationField, settings.destinationFieldId);
  if (destinationId === undefined) {
    logger.error(`Cannot proceed without finding the '${destinationField}' custom field.`);
    return emptyStats();
  }

  const testCases = await client.listTestCases();
  const stats: FieldMigrationStats = { ...emptyStats(), total: testCases.length };

  logger.info(`Analyzing ${stats.total} test cases...`);
  logger.info(`Migrating from '${sourceField}' (slug: ${sourceSlug}) to '${destinationField}' (ID: ${destinationId})`);

  const progress = new ProgressBar(stats.total);

  for (const [index, testCase] of testCases.entries()) {
    const label = describeCase(testCase);
    const current = testCase.custom_fields?.find((field) => field.id === destinationId)?.value;
    const updates = buildMigrationUpdate(testCase, sourceSlug, destinationId);

    logger.debug(`Case ${label} '${testCase.title || 'Untitled'}'`, {
      [sourceField]: updates ? 'yes' : 'no',
      [destinationField]: current ? 'set' : 'empty',
    });

    if (updates) {
      stats.needsMigration++;
      logger.debug(`Case ${label} needs migration`, { value: truncate(sourceText(testCase, sourceSlug)) });

      if (options.dryRun) {
        logger.debug(
          `[DRY RUN] Would update custom field ${destinationId} (${destinationField}) and clear ${sourceField} on case ${label}`
        );
        stats.migrated++;
      } else {
        try {
          await client.updateTestCase(testCase.id, updates);
          stats.migrated++;
          logger.debug(`✓ Migrated case ${label}`);
        } catch (error) {
          stats.errors++;
          logger.error(`✗ Failed to migrate case ${label}`, { error: serializeError(error) });
        }
      }
    } else if (current) {
      // Source already empty and destination filled: migrated by an earlier run
      stats.skipped++;
    }

    progress.update(
      index + 1,
      `Needs migration: ${stats.needsMigration}, Migrated: ${stats.migrated}, Errors: ${stats.errors}, Skipped: ${stats.skipped}`
    );
  }

  progress.done();
  return stats;
}
