import { JiraLinkSettings } from '../config';
import { QaseClient } from '../services/qase';
import { ExternalIssueLink, ExternalIssueType, RunOptions, TestCase } from '../types';
import { extractFromTestCase, findRefsValue } from '../transforms/jira-ids';
import { logger, serializeError } from '../utils/logger';
import { findCustomFieldId } from './migrate-field';
import { describeCase } from './text-fix';

export interface JiraLinkStats {
  total: number;
  casesWithRefs: number;
  casesWithoutRefs: number;
  withJiraIssues: number;
  /** Occurrences, counting an issue once per case that references it. */
  totalJiraIssues: number;
  uniqueJiraIssues: Set<string>;
  casesAttached: number;
  batchesAttached: number;
  errors: number;
}

export interface JiraLinkPlan {
  links: ExternalIssueLink[];
  stats: JiraLinkStats;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Refs custom field ID: the configured one, else a title search for the
 * configured name, `references` or `refs`. `undefined` means the system
 * refs fields are used.
 */
export async function resolveRefsFieldId(client: QaseClient, settings: JiraLinkSettings): Promise<number | undefined> {
  if (settings.refsFieldId !== undefined) {
    logger.info(`Using provided refs field ID: ${settings.refsFieldId}`);
    return settings.refsFieldId;
  }

  logger.info(`Fetching custom field definitions to find '${settings.refsFieldName}' field...`);
  const customFields = await client.listCustomFields();
  if (customFields.length === 0) {
    logger.warn('No custom fields found. Will try system fields.');
    return undefined;
  }

  for (const field of customFields) {
    logger.debug('Available custom field', { title: field.title, id: field.id, type: field.type });
  }

  const fieldId = findCustomFieldId(customFields, [settings.refsFieldName, 'references', 'refs']);
  if (fieldId === undefined) {
    logger.warn(`'${settings.refsFieldName}' field not found in custom fields. Will try system fields.`);
  } else {
    logger.info(`Found refs custom field with ID: ${fieldId}`);
  }
  return fieldId;
}

/**
 * Extract JIRA issue IDs from every test case and build one attach link per
 * case that references at least one issue.
 */
export function planJiraLinks(testCases: TestCase[], refsFieldId: number | undefined): JiraLinkPlan {
  const stats: JiraLinkStats = {
    total: testCases.length,
    casesWithRefs: 0,
    casesWithoutRefs: 0,
    withJiraIssues: 0,
    totalJiraIssues: 0,
    uniqueJiraIssues: new Set(),
    casesAttached: 0,
    batchesAttached: 0,
    errors: 0,
  };
  const links: ExternalIssueLink[] = [];

  for (const testCase of testCases) {
    const refs = findRefsValue(testCase, refsFieldId);
    // A refs custom field on the case counts even when it is empty
    const hasRefsField =
      refsFieldId !== undefined && (testCase.custom_fields ?? []).some((field) => field.id === refsFieldId);
    if (refs || hasRefsField) {
      stats.casesWithRefs++;
    } else {
      stats.casesWithoutRefs++;
    }

    const jiraIds = extractFromTestCase(testCase, refsFieldId);
    if (jiraIds.length > 0) {
      stats.withJiraIssues++;
      stats.totalJiraIssues += jiraIds.length;
      jiraIds.forEach((id) => stats.uniqueJiraIssues.add(id));
      links.push({ case_id: testCase.id, external_issues: jiraIds });
      logger.debug(`Case ${describeCase(testCase)} '${testCase.title || 'Untitled'}'`, {
        refs: refs?.value,
        jiraIssues: jiraIds,
      });
    } else if (refs) {
      logger.debug(`Case ${describeCase(testCase)}: no JIRA issues found in refs`, { refs: refs.value });
    }
  }

  return { links, stats };
}

type AttachResult = { ok: true } | { ok: false; error: unknown };

async function tryAttach(client: QaseClient, type: ExternalIssueType, links: ExternalIssueLink[]): Promise<AttachResult> {
  try {
    await client.attachExternalIssues(type, links);
    return { ok: true };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Attach links batch by batch. A batch the API rejects is retried one case
 * at a time so a single bad issue key does not sink its neighbours.
 */
export async function attachInBatches(
  client: QaseClient,
  type: ExternalIssueType,
  links: ExternalIssueLink[],
  batchSize: number,
  stats: JiraLinkStats
): Promise<void> {
  const failedBatches: ExternalIssueLink[][] = [];

  logger.info(`Attaching JIRA issues in batches of ${batchSize}...`);
  for (const [index, batch] of chunk(links, batchSize).entries()) {
    const batchNum = index + 1;
    const result = await tryAttach(client, type, batch);
    if (result.ok) {
      stats.casesAttached += batch.length;
      stats.batchesAttached++;
      logger.info(`✓ Attached batch ${batchNum} (${batch.length} cases)`);
    } else {
      failedBatches.push(batch);
      logger.warn(`✗ Failed to attach batch ${batchNum} (${batch.length} cases) - will retry individually`, {
        error: serializeError(result.error),
      });
    }
  }

  if (failedBatches.length === 0) return;

  logger.info(`Retrying ${failedBatches.length} failed batches as individual cases...`);
  for (const batch of failedBatches) {
    for (const link of batch) {
      const result = await tryAttach(client, type, [link]);
      if (result.ok) {
        stats.casesAttached++;
        logger.debug(`✓ Case ${link.case_id}: attached ${link.external_issues.length} JIRA issues`);
      } else {
        stats.errors++;
        logger.error(`✗ Case ${link.case_id}: failed to attach ${link.external_issues.length} JIRA issues`, {
          error: serializeError(result.error),
        });
      }
    }
  }
}

function logDryRunPlan(links: ExternalIssueLink[], batchSize: number): void {
  const batches = chunk(links, batchSize);
  logger.info(`[DRY RUN] Would attach JIRA issues in ${batches.length} batches`);
  for (const [index, batch] of batches.entries()) {
    logger.info(`  Batch ${index + 1}: ${batch.length} cases`);
    for (const link of batch.slice(0, 5)) {
      logger.debug(`    Case ${link.case_id}: ${link.external_issues.join(', ')}`);
    }
    if (batch.length > 5) {
      logger.debug(`    ... and ${batch.length - 5} more cases`);
    }
  }
}

/**
 * Link every test case to the JIRA issues named in its refs field.
 */
export async function linkJiraIssues(
  client: QaseClient,
  settings: JiraLinkSettings,
  options: RunOptions
): Promise<JiraLinkStats> {
  const refsFieldId = await resolveRefsFieldId(client, settings);
  const testCases = await client.listTestCases();

  logger.info(`Analyzing ${testCases.length} test cases for JIRA issues in refs field...`, { refsFieldId });
  const { links, stats } = planJiraLinks(testCases, refsFieldId);

  if (links.length === 0) {
    logger.info('No JIRA issues found in any test cases.');
    return stats;
  }

  if (options.dryRun) {
    logDryRunPlan(links, settings.batchSize);
  } else {
    await attachInBatches(client, settings.externalIssueType, links, settings.batchSize, stats);
    logger.info(`Attachment complete: ${stats.casesAttached} cases succeeded, ${stats.errors} cases failed`);
  }

  return stats;
}

export function averageIssuesPerCase(stats: JiraLinkStats): string | undefined {
  return stats.withJiraIssues > 0 ? (stats.totalJiraIssues / stats.withJiraIssues).toFixed(2) : undefined;
}
