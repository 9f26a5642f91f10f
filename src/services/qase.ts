import { DEFAULT_BASE_URL } from '../config';
import { logger, serializeError } from '../utils/logger';
import { QaseApiError } from '../utils/errors';
import {
  Attachment,
  CustomField,
  ExternalIssueLink,
  ExternalIssueType,
  QaseEnvelope,
  QasePage,
  SystemField,
  TestCase,
  TestCaseUpdate,
} from '../types';

/** The API rejects page sizes above this. */
export const MAX_PAGE_SIZE = 100;

/**
 * Operations the maintenance scripts need from Qase. Scripts depend on this
 * interface so they can be driven by an in-memory fake.
 */
export interface QaseClient {
  readonly projectCode: string;
  listTestCases(): Promise<TestCase[]>;
  listSystemFields(): Promise<SystemField[]>;
  listCustomFields(): Promise<CustomField[]>;
  updateTestCase(caseId: number, updates: TestCaseUpdate): Promise<void>;
  attachExternalIssues(type: ExternalIssueType, links: ExternalIssueLink[]): Promise<void>;
  listAttachments(): Promise<Attachment[]>;
  deleteAttachment(hash: string): Promise<void>;
  deleteCustomField(fieldId: number): Promise<void>;
}

export interface QaseApiClientOptions {
  apiToken: string;
  projectCode: string;
  baseUrl?: string;
  pageSize?: number;
}

function parseBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function isEnvelope(body: unknown): body is QaseEnvelope<unknown> {
  return typeof body === 'object' && body !== null && 'status' in body;
}

export class QaseApiClient implements QaseClient {
  readonly projectCode: string;
  private readonly apiToken: string;
  private readonly baseUrl: string;
  private readonly pageSize: number;

  constructor(options: QaseApiClientOptions) {
    this.apiToken = options.apiToken;
    this.projectCode = options.projectCode;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.pageSize = Math.min(options.pageSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE);
  }

  private async request<T>(endpoint: string, options: RequestInit = {}): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    const method = options.method || 'GET';

    logger.debug('Qase API request', { method, url, hasBody: !!options.body });

    let response: Response;
    try {
      response = await fetch(url, {
        ...options,
        headers: {
          Token: this.apiToken,
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
      });
    } catch (fetchError) {
      logger.error('Qase API fetch failed (network error)', {
        url,
        method,
        error: serializeError(fetchError),
      });
      throw fetchError;
    }

    // Read body as text first (can only be read once)
    const body = parseBody(await response.text());

    if (!response.ok) {
      logger.debug('Qase API error response', {
        status: response.status,
        statusText: response.statusText,
        url,
        method,
        requestBody: options.body ? String(options.body).substring(0, 500) : undefined,
      });
      throw new QaseApiError({ status: response.status, method, endpoint, body });
    }

    if (response.status === 204 || body === undefined) {
      return undefined as T;
    }

    if (isEnvelope(body)) {
      if (!body.status) {
        throw new QaseApiError({ status: response.status, method, endpoint, body });
      }
      return body.result as T;
    }

    return body as T;
  }

  /**
   * Follow offset pagination until `total` is reached or a page comes back empty.
   */
  private async paginate<T>(endpoint: string, label: string): Promise<T[]> {
    const all: T[] = [];
    let offset = 0;

    while (true) {
      const separator = endpoint.includes('?') ? '&' : '?';
      const page = await this.request<QasePage<T>>(
        `${endpoint}${separator}limit=${this.pageSize}&offset=${offset}`
      );
      const entities = page.entities ?? [];
      all.push(...entities);

      logger.info(`Fetched ${entities.length} ${label}`, { offset, total: page.total });

      const step = page.count || entities.length;
      if (entities.length === 0 || offset + step >= page.total) break;
      offset += step;
    }

    logger.info(`Total ${label} fetched: ${all.length}`);
    return all;
  }

  async listTestCases(): Promise<TestCase[]> {
    logger.info(`Fetching test cases from project '${this.projectCode}'...`);
    return this.paginate<TestCase>(`/case/${encodeURIComponent(this.projectCode)}`, 'test cases');
  }

  async listSystemFields(): Promise<SystemField[]> {
    const result = await this.request<SystemField[] | undefined>('/system_field');
    return result ?? [];
  }

  async listCustomFields(): Promise<CustomField[]> {
    logger.info('Fetching custom fields from workspace...');
    return this.paginate<CustomField>('/custom_field', 'custom fields');
  }

  async updateTestCase(caseId: number, updates: TestCaseUpdate): Promise<void> {
    await this.request(`/case/${encodeURIComponent(this.projectCode)}/${caseId}`, {
      method: 'PATCH',
      body: JSON.stringify(updates),
    });
  }

  async attachExternalIssues(type: ExternalIssueType, links: ExternalIssueLink[]): Promise<void> {
    await this.request(`/case/${encodeURIComponent(this.projectCode)}/external-issue/attach`, {
      method: 'POST',
      body: JSON.stringify({ type, links }),
    });
  }

  async listAttachments(): Promise<Attachment[]> {
    logger.info('Fetching attachments from workspace...');
    return this.paginate<Attachment>('/attachment', 'attachments');
  }

  async deleteAttachment(hash: string): Promise<void> {
    await this.request(`/attachment/${encodeURIComponent(hash)}`, { method: 'DELETE' });
  }

  async deleteCustomField(fieldId: number): Promise<void> {
    await this.request(`/custom_field/${fieldId}`, { method: 'DELETE' });
  }
}
