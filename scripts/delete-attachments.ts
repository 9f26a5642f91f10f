/**
 * Delete every workspace attachment of a given size in bytes. Asks for
 * confirmation unless --yes is given.
 *
 * Usage: npx tsx scripts/delete-attachments.ts [--size 157010] [--dry-run] [--yes]
 */

import { CommonOptions, createContext, createScriptCommand, handleFatal, parsePositiveInt } from '../src/cli';
import { DEFAULT_ATTACHMENT_SIZE, deleteAttachmentsBySize } from '../src/operations/delete-attachments';
import { confirmOnTerminal } from '../src/utils/prompt';
import { formatBanner, formatSummary } from '../src/utils/report';

interface DeleteAttachmentsOptions extends CommonOptions {
  yes: boolean;
  size: number;
}

const program = createScriptCommand('delete-attachments', 'Delete workspace attachments that match a size')
  .option('--size <bytes>', 'attachment size to delete', parsePositiveInt, DEFAULT_ATTACHMENT_SIZE)
  .option('-y, --yes', 'delete without asking for confirmation', false);

async function main() {
  program.parse();
  const options = program.opts<DeleteAttachmentsOptions>();
  const { client, run } = createContext(options, false);

  console.log(formatBanner('Delete Attachments by Size', run, [['Size', options.size]]));

  const stats = await deleteAttachmentsBySize(client, options.size, {
    dryRun: run.dryRun,
    assumeYes: options.yes,
    confirm: confirmOnTerminal,
  });
  if (stats.cancelled) return;

  console.log(
    formatSummary([
      ['Total attachments checked', stats.total],
      [`Attachments with size ${options.size}`, stats.matched],
      ['Successfully deleted', stats.deleted],
      ['Failed', stats.failed],
    ])
  );
}

main().catch(handleFatal);
