/**
 * Remove inline attachment markdown left behind by a TestRail import:
 *
 *   [![attachment](https://.../attachment/HASH/attachment)](index.php?/attachments/get/ID)
 *   ![attachment](https://.../attachment/HASH/attachment)
 *
 * Usage: npx tsx scripts/remove-attachment-references.ts [--dry-run] [--verbose]
 */

import { CommonOptions, createContext, createScriptCommand, handleFatal } from '../src/cli';
import { removeAttachmentReferencesInProject } from '../src/operations/remove-attachment-references';
import { textFixSummaryRows } from '../src/operations/text-fix';
import { formatBanner, formatSummary } from '../src/utils/report';

const program = createScriptCommand(
  'remove-attachment-references',
  'Remove attachment references from Qase test cases'
);

async function main() {
  program.parse();
  const { config, client, run } = createContext(program.opts<CommonOptions>());

  console.log(formatBanner('Remove Attachment References from Test Cases', run, [['Project', config.projectCode]]));
  const stats = await removeAttachmentReferencesInProject(client, run);
  console.log(formatSummary(textFixSummaryRows(stats, 'attachment references')));
}

main().catch(handleFatal);
