import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { QaseApiClient } from '../../src/services/qase';
import { QaseApiError } from '../../src/utils/errors';

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestAt(fetchMock: Mock<FetchFn>, index: number): { url: string; init?: RequestInit } {
  const [url, init] = fetchMock.mock.calls[index];
  return { url, init };
}

describe('QaseApiClient', () => {
  let fetchMock: Mock<FetchFn>;
  let client: QaseApiClient;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal('fetch', fetchMock);
    client = new QaseApiClient({
      apiToken: 'test-token',
      projectCode: 'DEMO',
      baseUrl: 'https://api.qase.test/v1/',
      pageSize: 2,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('follows offset pagination until the total is reached', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ status: true, result: { total: 3, count: 2, entities: [{ id: 1 }, { id: 2 }] } }))
      .mockResolvedValueOnce(jsonResponse({ status: true, result: { total: 3, count: 1, entities: [{ id: 3 }] } }));

    const cases = await client.listTestCases();

    expect(cases.map((testCase) => testCase.id)).toEqual([1, 2, 3]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requestAt(fetchMock, 0).url).toBe('https://api.qase.test/v1/case/DEMO?limit=2&offset=0');
    expect(requestAt(fetchMock, 1).url).toBe('https://api.qase.test/v1/case/DEMO?limit=2&offset=2');
    expect(requestAt(fetchMock, 0).init?.headers).toMatchObject({ Token: 'test-token' });
  });

  it('stops at an empty page', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: true, result: { total: 10, count: 0, entities: [] } }));

    await expect(client.listCustomFields()).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('returns system fields from the envelope', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: true, result: [{ title: 'Description', slug: 'description' }] }));

    await expect(client.listSystemFields()).resolves.toEqual([{ title: 'Description', slug: 'description' }]);
    expect(requestAt(fetchMock, 0).url).toBe('https://api.qase.test/v1/system_field');
  });

  it('patches a test case', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: true, result: { id: 7 } }));

    await client.updateTestCase(7, { description: 'new' });

    const { url, init } = requestAt(fetchMock, 0);
    expect(url).toBe('https://api.qase.test/v1/case/DEMO/7');
    expect(init?.method).toBe('PATCH');
    expect(init?.body).toBe('{"description":"new"}');
  });

  it('posts external issue links', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: true }));

    await client.attachExternalIssues('jira-cloud', [{ case_id: 1, external_issues: ['PROJ-1'] }]);

    const { url, init } = requestAt(fetchMock, 0);
    expect(url).toBe('https://api.qase.test/v1/case/DEMO/external-issue/attach');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"type":"jira-cloud","links":[{"case_id":1,"external_issues":["PROJ-1"]}]}');
  });

  it('deletes attachments and custom fields', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: true, result: { id: 4 } }));

    await client.deleteAttachment('abc123');
    await client.deleteCustomField(4);

    expect(requestAt(fetchMock, 0)).toMatchObject({
      url: 'https://api.qase.test/v1/attachment/abc123',
      init: { method: 'DELETE' },
    });
    expect(requestAt(fetchMock, 1).url).toBe('https://api.qase.test/v1/custom_field/4');
  });

  it('throws QaseApiError for error responses', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ status: false, errors: { 'steps.0.action': ['Action field is required'] } }, 422)
    );

    const error = await client.updateTestCase(1, { steps: [{ action: '' }] }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(QaseApiError);
    if (!(error instanceof QaseApiError)) return;
    expect(error.status).toBe(422);
    expect(error.method).toBe('PATCH');
    expect(error.endpoint).toBe('/case/DEMO/1');
    expect(error.isMissingStepAction()).toBe(true);
  });

  it('throws when a successful response carries status false', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: false, errorMessage: 'Project not found' }));

    await expect(client.listSystemFields()).rejects.toThrow(
      'Qase API error: 200 GET /system_field - {"status":false,"errorMessage":"Project not found"}'
    );
  });

  it('rethrows network errors', async () => {
    const failure = new TypeError('fetch failed');
    fetchMock.mockRejectedValueOnce(failure);

    await expect(client.deleteCustomField(1)).rejects.toBe(failure);
  });
});

describe('QaseApiError', () => {
  it('only flags missing step actions on 422 responses', () => {
    const body = { errors: { 'steps.1.action': 'Action field is required' } };
    expect(new QaseApiError({ status: 422, method: 'PATCH', endpoint: '/case/DEMO/1', body }).isMissingStepAction()).toBe(
      true
    );
    expect(new QaseApiError({ status: 400, method: 'PATCH', endpoint: '/case/DEMO/1', body }).isMissingStepAction()).toBe(
      false
    );
    expect(
      new QaseApiError({ status: 422, method: 'PATCH', endpoint: '/case/DEMO/1', body: 'Unprocessable' }).isMissingStepAction()
    ).toBe(false);
  });
});
