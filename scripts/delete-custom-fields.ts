/**
 * Delete ALL custom fields from the workspace. Asks for confirmation unless
 * --yes is given.
 *
 * Usage: npx tsx scripts/delete-custom-fields.ts [--dry-run] [--yes]
 */

import { CommonOptions, createContext, createScriptCommand, handleFatal } from '../src/cli';
import { deleteAllCustomFields } from '../src/operations/delete-custom-fields';
import { confirmOnTerminal } from '../src/utils/prompt';
import { formatBanner, formatSummary } from '../src/utils/report';

interface DeleteOptions extends CommonOptions {
  yes: boolean;
}

const program = createScriptCommand('delete-custom-fields', 'Delete all custom fields from the Qase workspace').option(
  '-y, --yes',
  'delete without asking for confirmation',
  false
);

async function main() {
  program.parse();
  const options = program.opts<DeleteOptions>();
  // Custom fields belong to the workspace, not to a project
  const { client, run } = createContext(options, false);

  console.log(formatBanner('Delete All Custom Fields', run));

  const stats = await deleteAllCustomFields(client, {
    dryRun: run.dryRun,
    assumeYes: options.yes,
    confirm: confirmOnTerminal,
  });
  if (stats.cancelled) return;

  console.log(
    formatSummary([
      ['Total custom fields', stats.total],
      ['Successfully deleted', stats.deleted],
      ['Failed', stats.failed],
    ])
  );
}

main().catch(handleFatal);
