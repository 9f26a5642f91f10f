/**
 * Fix CSV attachments that the Qase importer turned into image embeds.
 *
 * Before:  ![users.csv](https://qase.io/attachment/abc/users.csv)
 * After:   [users.csv](https://qase.io/attachment/abc/users.csv)
 *
 * Usage: npx tsx scripts/fix-csv-references.ts [--dry-run] [--verbose]
 */

import { CommonOptions, createContext, createScriptCommand, handleFatal } from '../src/cli';
import { fixCsvReferencesInProject } from '../src/operations/fix-csv-references';
import { textFixSummaryRows } from '../src/operations/text-fix';
import { formatBanner, formatSummary } from '../src/utils/report';

const program = createScriptCommand('fix-csv-references', 'Fix broken CSV file references in Qase test cases');

async function main() {
  program.parse();
  const { config, client, run } = createContext(program.opts<CommonOptions>());

  console.log(formatBanner('Qase CSV Reference Fixer', run, [['Project', config.projectCode]]));

  const stats = await fixCsvReferencesInProject(client, run);

  const notes =
    stats.needsFixing === 0 && stats.total > 0
      ? ['[INFO] All test cases are already fixed! No broken CSV references found.']
      : [];
  console.log(formatSummary(textFixSummaryRows(stats, 'broken CSV references'), notes));
}

main().catch(handleFatal);
