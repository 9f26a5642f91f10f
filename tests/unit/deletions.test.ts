import { describe, expect, it, vi } from 'vitest';
import { deleteAttachmentsBySize, DEFAULT_ATTACHMENT_SIZE, filterBySize } from '../../src/operations/delete-attachments';
import { deleteAllCustomFields } from '../../src/operations/delete-custom-fields';
import { FakeQaseClient } from '../helpers/fake-client';

function clientWithFields(): FakeQaseClient {
  const client = new FakeQaseClient();
  client.customFields = [
    { id: 1, title: 'Legacy' },
    { id: 2, title: 'Old refs' },
  ];
  return client;
}

describe('deleteAllCustomFields', () => {
  it('does nothing when the prompt is declined', async () => {
    const client = clientWithFields();
    const confirm = vi.fn(async () => false);

    const stats = await deleteAllCustomFields(client, { dryRun: false, assumeYes: false, confirm });

    expect(confirm).toHaveBeenCalledWith('Are you sure you want to delete all 2 custom field(s)?');
    expect(stats).toEqual({ total: 2, matched: 2, deleted: 0, failed: 0, cancelled: true });
    expect(client.deletedCustomFields).toEqual([]);
  });

  it('skips the prompt with --yes and keeps going after a failure', async () => {
    const client = clientWithFields();
    client.failDelete = (id) => (id === 1 ? new Error('in use') : undefined);
    const confirm = vi.fn(async () => true);

    const stats = await deleteAllCustomFields(client, { dryRun: false, assumeYes: true, confirm });

    expect(confirm).not.toHaveBeenCalled();
    expect(stats).toEqual({ total: 2, matched: 2, deleted: 1, failed: 1, cancelled: false });
    expect(client.deletedCustomFields).toEqual([2]);
  });

  it('neither prompts nor deletes in dry-run mode', async () => {
    const client = clientWithFields();
    const confirm = vi.fn(async () => true);

    const stats = await deleteAllCustomFields(client, { dryRun: true, assumeYes: false, confirm });

    expect(confirm).not.toHaveBeenCalled();
    expect(stats.deleted).toBe(0);
    expect(client.deletedCustomFields).toEqual([]);
  });
});

describe('deleteAttachmentsBySize', () => {
  function clientWithAttachments(): FakeQaseClient {
    const client = new FakeQaseClient();
    client.attachments = [
      { hash: 'aaa', size: DEFAULT_ATTACHMENT_SIZE, file: 'logo.png' },
      { hash: 'bbb', size: 10 },
      { hash: 'ccc', size: DEFAULT_ATTACHMENT_SIZE },
    ];
    return client;
  }

  it('deletes only attachments of the given size', async () => {
    const client = clientWithAttachments();
    const confirm = vi.fn(async () => true);

    const stats = await deleteAttachmentsBySize(client, DEFAULT_ATTACHMENT_SIZE, {
      dryRun: false,
      assumeYes: false,
      confirm,
    });

    expect(confirm).toHaveBeenCalledWith('Are you sure you want to delete all 2 attachment(s) with size 157010?');
    expect(client.deletedAttachments).toEqual(['aaa', 'ccc']);
    expect(stats).toEqual({ total: 3, matched: 2, deleted: 2, failed: 0, cancelled: false });
  });

  it('returns early when nothing matches', async () => {
    const client = clientWithAttachments();
    const confirm = vi.fn(async () => true);

    const stats = await deleteAttachmentsBySize(client, 1, { dryRun: false, assumeYes: false, confirm });

    expect(confirm).not.toHaveBeenCalled();
    expect(stats).toEqual({ total: 3, matched: 0, deleted: 0, failed: 0, cancelled: false });
  });

  it('filters by exact size', () => {
    expect(filterBySize([{ hash: 'x', size: 5 }, { hash: 'y' }], 5)).toEqual([{ hash: 'x', size: 5 }]);
  });
});
