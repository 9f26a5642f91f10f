/**
 * Link JIRA issues to Qase test cases by extracting issue keys (PROJECT-123)
 * from each case's refs field.
 *
 * Usage: npx tsx scripts/link-jira-issues.ts [--type jira-server] [--batch-size 25] [--dry-run]
 */

import { Option } from 'commander';
import { CommonOptions, createContext, createScriptCommand, handleFatal, parsePositiveInt } from '../src/cli';
import { resolveJiraLinkSettings } from '../src/config';
import { averageIssuesPerCase, linkJiraIssues } from '../src/operations/link-jira-issues';
import { EXTERNAL_ISSUE_TYPES } from '../src/types';
import { formatBanner, formatSummary, ReportRow } from '../src/utils/report';

interface LinkJiraOptions extends CommonOptions {
  type?: string;
  batchSize?: number;
  refsField?: string;
  refsFieldId?: number;
}

const program = createScriptCommand(
  'link-jira-issues',
  'Link JIRA issues to Qase test cases by extracting JIRA IDs from test case fields'
)
  .addOption(new Option('--type <type>', 'type of JIRA instance (default: jira-cloud)').choices(EXTERNAL_ISSUE_TYPES))
  .option('--batch-size <n>', 'number of cases per batch (default: 50)', parsePositiveInt)
  .option('--refs-field <name>', "name of the refs field (default: 'jira_refs_field' in config or 'refs')")
  .option('--refs-field-id <id>', 'ID of the refs custom field (skips the name search)', parsePositiveInt);

async function main() {
  program.parse();
  const options = program.opts<LinkJiraOptions>();
  const { config, client, run } = createContext(options);
  const settings = resolveJiraLinkSettings(options, config.file);

  console.log(
    formatBanner('Qase JIRA Issue Linker', run, [
      ['External issue type', settings.externalIssueType],
      ['Batch size', settings.batchSize],
    ])
  );

  const stats = await linkJiraIssues(client, settings, run);

  const rows: ReportRow[] = [
    ['Total test cases', stats.total],
    ['Cases with refs field', stats.casesWithRefs],
    ['Cases without refs field', stats.casesWithoutRefs],
    ['Cases with JIRA issues', stats.withJiraIssues],
    ['Total JIRA issue occurrences', `${stats.totalJiraIssues} (may include duplicates)`],
    ['Unique JIRA issues', `${stats.uniqueJiraIssues.size} (distinct issue IDs)`],
  ];
  const average = averageIssuesPerCase(stats);
  if (average !== undefined) rows.push(['Average issues per case', average]);
  if (!run.dryRun) {
    rows.push(['Cases attached', stats.casesAttached], ['Batches attached', stats.batchesAttached], ['Errors', stats.errors]);
  }
  console.log(formatSummary(rows));
}

main().catch(handleFatal);
