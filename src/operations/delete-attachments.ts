import { QaseClient } from '../services/qase';
import { Attachment } from '../types';
import { logger, serializeError } from '../utils/logger';
import { ProgressBar } from '../utils/progress';
import { askToProceed, DeletionOptions, DeletionStats } from './delete-custom-fields';

export const DEFAULT_ATTACHMENT_SIZE = 157010;

export function filterBySize(attachments: Attachment[], size: number): Attachment[] {
  return attachments.filter((attachment) => attachment.size === size);
}

/**
 * Delete every workspace attachment whose size in bytes equals `size`.
 * Typically used to purge one file that an import duplicated many times.
 */
export async function deleteAttachmentsBySize(
  client: QaseClient,
  size: number,
  options: DeletionOptions
): Promise<DeletionStats> {
  const attachments = await client.listAttachments();
  const matching = filterBySize(attachments, size);
  const stats: DeletionStats = {
    total: attachments.length,
    matched: matching.length,
    deleted: 0,
    failed: 0,
    cancelled: false,
  };

  if (matching.length === 0) {
    logger.info(`No attachments found with size ${size}.`, { checked: attachments.length });
    return stats;
  }

  logger.info(`Found ${matching.length} attachment(s) with size ${size}`);
  for (const attachment of matching.slice(0, 10)) {
    logger.info(`  - Hash: ${attachment.hash.slice(0, 16)}..., File: ${attachment.file || 'Unknown'}`);
  }
  if (matching.length > 10) {
    logger.info(`  ... and ${matching.length - 10} more`);
  }

  if (options.dryRun) {
    logger.info(`[DRY RUN] Would delete ${matching.length} attachment(s)`);
    return stats;
  }

  const question = `Are you sure you want to delete all ${matching.length} attachment(s) with size ${size}?`;
  if (!(await askToProceed(question, options))) {
    return { ...stats, cancelled: true };
  }

  const progress = new ProgressBar(matching.length);
  for (const [index, attachment] of matching.entries()) {
    try {
      await client.deleteAttachment(attachment.hash);
      stats.deleted++;
    } catch (error) {
      stats.failed++;
      logger.error(`Error deleting attachment ${attachment.hash}`, { error: serializeError(error) });
    }
    progress.update(index + 1, `Deleted: ${stats.deleted}, Failed: ${stats.failed}`);
  }
  progress.done();

  return stats;
}
