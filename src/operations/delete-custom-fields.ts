import { QaseClient } from '../services/qase';
import { logger, serializeError } from '../utils/logger';
import { Confirm } from '../utils/prompt';

export interface DeletionStats {
  total: number;
  matched: number;
  deleted: number;
  failed: number;
  cancelled: boolean;
}

export interface DeletionOptions {
  dryRun: boolean;
  /** Skip the prompt; used by `--yes`. */
  assumeYes: boolean;
  confirm: Confirm;
}

export async function askToProceed(question: string, options: DeletionOptions): Promise<boolean> {
  if (options.assumeYes) return true;
  const confirmed = await options.confirm(question);
  if (!confirmed) {
    logger.info('Deletion cancelled.');
  }
  return confirmed;
}

/**
 * Delete every custom field in the workspace, one at a time.
 */
export async function deleteAllCustomFields(client: QaseClient, options: DeletionOptions): Promise<DeletionStats> {
  const fields = await client.listCustomFields();
  const stats: DeletionStats = { total: fields.length, matched: fields.length, deleted: 0, failed: 0, cancelled: false };

  if (fields.length === 0) {
    logger.info('No custom fields found. Nothing to delete.');
    return stats;
  }

  logger.info(`Found ${fields.length} custom field(s) to delete`);
  for (const field of fields) {
    logger.info(`  - ID: ${field.id}, Title: ${field.title || 'Unknown'}`);
  }

  if (options.dryRun) {
    logger.info(`[DRY RUN] Would delete ${fields.length} custom field(s)`);
    return stats;
  }

  if (!(await askToProceed(`Are you sure you want to delete all ${fields.length} custom field(s)?`, options))) {
    return { ...stats, cancelled: true };
  }

  for (const field of fields) {
    try {
      await client.deleteCustomField(field.id);
      stats.deleted++;
      logger.info(`✓ Deleted custom field ID ${field.id} ('${field.title || 'Unknown'}')`);
    } catch (error) {
      stats.failed++;
      logger.error(`✗ Failed to delete custom field ID ${field.id}`, { error: serializeError(error) });
    }
  }

  return stats;
}
