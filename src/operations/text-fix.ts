import { QaseClient } from '../services/qase';
import { FieldCounts, RunOptions, TestCase, TestCaseUpdate } from '../types';
import { countFixedFields, emptyFieldCounts } from '../transforms/test-case-fields';
import { logger, serializeError } from '../utils/logger';
import { ProgressBar } from '../utils/progress';

export interface TextFixStats {
  total: number;
  needsFixing: number;
  fixed: number;
  skipped: number;
  errors: number;
  fieldsFixed: FieldCounts;
}

/**
 * Writes one update. May return a note for the log line, e.g. when the
 * payload had to be patched before the API accepted it.
 */
export type CaseUpdater = (client: QaseClient, caseId: number, updates: TestCaseUpdate) => Promise<string | void>;

export interface TextFixJob {
  /** What is being fixed, e.g. "broken CSV references". */
  subject: string;
  analyze: (testCase: TestCase) => TestCaseUpdate;
  /** Extra per-case detail logged under --verbose. */
  inspect?: (testCase: TestCase) => Record<string, unknown>;
  update?: CaseUpdater;
}

const defaultUpdate: CaseUpdater = async (client, caseId, updates) => {
  await client.updateTestCase(caseId, updates);
};

export function describeCase(testCase: TestCase): string {
  return `${testCase.code || `C${testCase.id}`} (${testCase.id})`;
}

/**
 * Fetch every test case, apply the job's analysis and PATCH the fields it
 * changes. Write failures are counted and the run continues.
 */
export async function runTextFix(client: QaseClient, job: TextFixJob, options: RunOptions): Promise<TextFixStats> {
  const testCases = await client.listTestCases();
  const update = job.update ?? defaultUpdate;
  const stats: TextFixStats = {
    total: testCases.length,
    needsFixing: 0,
    fixed: 0,
    skipped: 0,
    errors: 0,
    fieldsFixed: emptyFieldCounts(),
  };

  logger.info(`Analyzing ${stats.total} test cases for ${job.subject}...`);
  const progress = new ProgressBar(stats.total);

  for (const [index, testCase] of testCases.entries()) {
    const label = describeCase(testCase);
    const title = testCase.title || 'Untitled';

    if (options.verbose && job.inspect) {
      logger.debug(`Case ${label} '${title}'`, job.inspect(testCase));
    }

    const updates = job.analyze(testCase);
    const fields = Object.keys(updates);

    if (fields.length === 0) {
      stats.skipped++;
      logger.debug(`[SKIP] Case ${label}: no ${job.subject} found`);
    } else {
      stats.needsFixing++;
      countFixedFields(stats.fieldsFixed, updates);
      logger.info(`Case ${label} '${title}' needs fixing`, { fields });

      if (options.dryRun) {
        logger.info(`[DRY RUN] Would update case ${label}`);
        logger.info('Update payload', { caseId: testCase.id, updates });
        stats.fixed++;
      } else {
        try {
          const note = await update(client, testCase.id, updates);
          stats.fixed++;
          logger.info(`✓ Updated case ${label}${note ? ` - ${note}` : ''}`);
        } catch (error) {
          stats.errors++;
          logger.error(`✗ Failed to update case ${label}`, { error: serializeError(error) });
        }
      }
    }

    progress.update(index + 1, `Fixed: ${stats.fixed}, Errors: ${stats.errors}, Skipped: ${stats.skipped}`);
  }

  progress.done();
  return stats;
}

export function textFixSummaryRows(stats: TextFixStats, subject: string): Array<[string, number]> {
  return [
    ['Total test cases', stats.total],
    [`Cases with ${subject}`, stats.needsFixing],
    ['Cases fixed', stats.fixed],
    ['Cases skipped', stats.skipped],
    ['Errors', stats.errors],
    ['Description fields fixed', stats.fieldsFixed.description],
    ['Preconditions fields fixed', stats.fieldsFixed.preconditions],
    ['Postconditions fields fixed', stats.fieldsFixed.postconditions],
    ['Step lists fixed', stats.fieldsFixed.steps],
    ['Custom fields fixed', stats.fieldsFixed.custom_fields],
  ];
}
