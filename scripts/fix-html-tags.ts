/**
 * Strip HTML tags (e.g. `<p>...</p>`) from every text field of every test case.
 *
 * Usage: npx tsx scripts/fix-html-tags.ts [--dry-run] [--verbose]
 */

import { CommonOptions, createContext, createScriptCommand, handleFatal } from '../src/cli';
import { fixHtmlTagsInProject } from '../src/operations/fix-html-tags';
import { textFixSummaryRows } from '../src/operations/text-fix';
import { formatBanner, formatSummary } from '../src/utils/report';

const program = createScriptCommand('fix-html-tags', 'Remove HTML tags from all fields in Qase test cases');

async function main() {
  program.parse();
  const { config, client, run } = createContext(program.opts<CommonOptions>());

  console.log(formatBanner('Fix HTML Tags in Test Cases', run, [['Project', config.projectCode]]));
  const stats = await fixHtmlTagsInProject(client, run);
  console.log(formatSummary(textFixSummaryRows(stats, 'HTML tags')));
}

main().catch(handleFatal);
