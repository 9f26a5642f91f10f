import { beforeEach, describe, expect, it, vi } from 'vitest';
import { fixCsvReferencesInProject } from '../../src/operations/fix-csv-references';
import { fixHtmlTagsInProject } from '../../src/operations/fix-html-tags';
import {
  removeAttachmentReferencesInProject,
  updateWithActionRetry,
} from '../../src/operations/remove-attachment-references';
import { describeCase, textFixSummaryRows } from '../../src/operations/text-fix';
import { QaseApiError } from '../../src/utils/errors';
import { logger } from '../../src/utils/logger';
import { FakeQaseClient } from '../helpers/fake-client';

const run = { dryRun: false, verbose: false };

function missingActionError(): QaseApiError {
  return new QaseApiError({
    status: 422,
    method: 'PATCH',
    endpoint: '/case/DEMO/9',
    body: { status: false, errors: { 'steps.0.action': ['Action field is required'] } },
  });
}

describe('fixCsvReferencesInProject', () => {
  let client: FakeQaseClient;

  beforeEach(() => {
    client = new FakeQaseClient();
    client.testCases = [
      { id: 1, code: 'DEMO-1', description: '![a.csv](u)' },
      { id: 2, description: 'ok' },
      { id: 3, preconditions: '![b.csv](v)', custom_fields: [{ id: 5, value: '![c.csv](w)' }] },
    ];
    client.failUpdate = (caseId) => (caseId === 3 ? new Error('boom') : undefined);
  });

  it('updates broken cases and counts failures without stopping', async () => {
    const stats = await fixCsvReferencesInProject(client, run);

    expect(stats).toEqual({
      total: 3,
      needsFixing: 2,
      fixed: 1,
      skipped: 1,
      errors: 1,
      fieldsFixed: { description: 1, preconditions: 1, postconditions: 0, steps: 0, custom_fields: 1 },
    });
    expect(client.updates).toEqual([{ caseId: 1, updates: { description: '[a.csv](u)' } }]);
  });

  it('writes nothing in dry-run mode', async () => {
    const stats = await fixCsvReferencesInProject(client, { dryRun: true, verbose: true });

    expect(stats.fixed).toBe(2);
    expect(stats.errors).toBe(0);
    expect(client.updates).toEqual([]);
  });

  it('prints each would-be payload in dry-run mode', async () => {
    const info = vi.spyOn(logger, 'info');

    await fixCsvReferencesInProject(client, { dryRun: true, verbose: false });

    expect(info).toHaveBeenCalledWith('Update payload', { caseId: 1, updates: { description: '[a.csv](u)' } });
  });
});

describe('fixHtmlTagsInProject', () => {
  it('writes the stripped text back', async () => {
    const client = new FakeQaseClient();
    client.testCases = [{ id: 4, postconditions: '<p>Logged out</p>' }];

    const stats = await fixHtmlTagsInProject(client, run);

    expect(stats.fixed).toBe(1);
    expect(client.updates).toEqual([{ caseId: 4, updates: { postconditions: 'Logged out' } }]);
  });
});

describe('updateWithActionRetry', () => {
  it('retries with placeholder actions when the API rejects an empty action', async () => {
    const client = new FakeQaseClient();
    let calls = 0;
    client.failUpdate = () => (calls++ === 0 ? missingActionError() : undefined);

    const note = await updateWithActionRetry(client, 9, { steps: [{ hash: 'a', action: '' }] });

    expect(note).toBe('patched empty actions');
    expect(client.updates).toEqual([{ caseId: 9, updates: { steps: [{ hash: 'a', action: '.' }] } }]);
  });

  it('rethrows other errors', async () => {
    const client = new FakeQaseClient();
    const failure = new QaseApiError({ status: 500, method: 'PATCH', endpoint: '/case/DEMO/9', body: 'oops' });
    client.failUpdate = () => failure;

    await expect(updateWithActionRetry(client, 9, { steps: [{ action: '' }] })).rejects.toBe(failure);
  });

  it('does not retry updates without steps', async () => {
    const client = new FakeQaseClient();
    const failure = missingActionError();
    client.failUpdate = () => failure;

    await expect(updateWithActionRetry(client, 9, { description: 'x' })).rejects.toBe(failure);
  });
});

describe('removeAttachmentReferencesInProject', () => {
  it('removes references from every text field', async () => {
    const client = new FakeQaseClient();
    client.testCases = [
      {
        id: 5,
        description: 'See ![attachment](https://qase.test/a) below',
        steps: [{ position: 1, action: 'Open', expected_result: '![attachment](https://qase.test/b)' }],
      },
    ];

    const stats = await removeAttachmentReferencesInProject(client, run);

    expect(stats.fixed).toBe(1);
    expect(client.updates).toEqual([
      {
        caseId: 5,
        updates: {
          description: 'See below',
          steps: [{ position: 1, action: 'Open', expected_result: '' }],
        },
      },
    ]);
  });
});

describe('describeCase', () => {
  it('uses the code when present, else a C-prefixed id', () => {
    expect(describeCase({ id: 1, code: 'DEMO-1' })).toBe('DEMO-1 (1)');
    expect(describeCase({ id: 2 })).toBe('C2 (2)');
  });
});

describe('textFixSummaryRows', () => {
  it('labels the subject row', () => {
    const rows = textFixSummaryRows(
      {
        total: 3,
        needsFixing: 2,
        fixed: 1,
        skipped: 1,
        errors: 1,
        fieldsFixed: { description: 1, preconditions: 0, postconditions: 0, steps: 0, custom_fields: 2 },
      },
      'HTML tags'
    );
    expect(rows[1]).toEqual(['Cases with HTML tags', 2]);
    expect(rows[9]).toEqual(['Custom fields fixed', 2]);
  });
});
