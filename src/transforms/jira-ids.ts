import { TestCase } from '../types';
import { logger } from '../utils/logger';

// PROJECT-123: uppercase letter, then uppercase letters or digits, dash, number
const JIRA_ISSUE_ID = /\b([A-Z][A-Z0-9]+-\d+)\b/g;

function unique(ids: string[]): string[] {
  return Array.from(new Set(ids));
}

/**
 * Unique JIRA issue IDs in first-seen order. Works on plain IDs and on
 * browse URLs alike.
 */
export function extractJiraIssueIds(text: string | null | undefined): string[] {
  if (!text) return [];
  return unique(Array.from(text.matchAll(JIRA_ISSUE_ID), (match) => match[1]));
}

export type RefsSource = `custom_field[${number}]` | 'system_field[refs]' | 'system_field[references]';

export interface RefsValue {
  value: unknown;
  source: RefsSource;
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string' || Array.isArray(value)) return value.length > 0;
  return true;
}

/**
 * Locate the refs value of a test case: the refs custom field when its ID is
 * known and it holds a value, else the `refs` or `references` system field.
 */
export function findRefsValue(testCase: TestCase, refsFieldId?: number): RefsValue | null {
  if (refsFieldId !== undefined) {
    const field = (testCase.custom_fields ?? []).find((candidate) => candidate.id === refsFieldId);
    if (field && isPresent(field.value)) {
      return { value: field.value, source: `custom_field[${refsFieldId}]` };
    }
  }

  if (isPresent(testCase.refs)) {
    return { value: testCase.refs, source: 'system_field[refs]' };
  }
  if (isPresent(testCase.references)) {
    return { value: testCase.references, source: 'system_field[references]' };
  }
  return null;
}

/**
 * JIRA issue IDs referenced by a test case. The refs value may be a single
 * string or a list; non-string list items are skipped.
 */
export function extractFromTestCase(testCase: TestCase, refsFieldId?: number): string[] {
  const refs = findRefsValue(testCase, refsFieldId);
  if (!refs) {
    logger.debug('No refs field found', { caseId: testCase.id });
    return [];
  }

  let items: unknown[];
  if (Array.isArray(refs.value)) {
    items = refs.value;
  } else if (typeof refs.value === 'string') {
    items = [refs.value];
  } else {
    logger.debug('Unsupported refs value type', { caseId: testCase.id, type: typeof refs.value });
    return [];
  }

  const ids: string[] = [];
  items.forEach((item, index) => {
    if (typeof item === 'string') {
      ids.push(...extractJiraIssueIds(item));
    } else {
      logger.debug('Skipping non-string ref', { caseId: testCase.id, index, type: typeof item });
    }
  });

  const result = unique(ids);
  logger.debug('Extracted JIRA issue IDs', { caseId: testCase.id, source: refs.source, ids: result });
  return result;
}
