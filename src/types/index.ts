// Qase API Types
export interface QaseEnvelope<T> {
  status: boolean;
  result: T;
  errorMessage?: string;
  errorFields?: Array<{ field: string; error: string }>;
}

export interface QasePage<T> {
  total: number;
  filtered?: number;
  count: number;
  entities: T[];
}

export interface TestStep {
  hash?: string;
  position?: number;
  action?: string | null;
  expected_result?: string | null;
  data?: string | null;
  steps?: TestStep[];
  [key: string]: unknown;
}

export interface CustomFieldValue {
  id: number;
  value: string | null;
}

export interface TestCase {
  id: number;
  code?: string;
  title?: string;
  description?: string | null;
  preconditions?: string | null;
  postconditions?: string | null;
  steps?: TestStep[];
  custom_fields?: CustomFieldValue[];
  refs?: unknown;
  references?: unknown;
  [key: string]: unknown;
}

export interface SystemField {
  id?: number;
  title: string;
  slug: string;
  type?: number;
}

export interface CustomField {
  id: number;
  title: string;
  type?: string;
}

export interface Attachment {
  hash: string;
  file?: string;
  size?: number;
  mime?: string;
  url?: string;
}

/**
 * PATCH body for a test case. Custom field values go under `custom_field`
 * keyed by the field ID as a string; system fields are keyed by slug.
 */
export interface TestCaseUpdate {
  description?: string;
  preconditions?: string;
  postconditions?: string;
  steps?: TestStep[];
  custom_field?: Record<string, string>;
  [slug: string]: unknown;
}

export type ExternalIssueType = 'jira-cloud' | 'jira-server';

export const EXTERNAL_ISSUE_TYPES: readonly ExternalIssueType[] = ['jira-cloud', 'jira-server'];

export interface ExternalIssueLink {
  case_id: number;
  external_issues: string[];
}

// Run Types
export interface RunOptions {
  dryRun: boolean;
  verbose: boolean;
}

/** Fields that `analyzeTestCase`-style fixers may rewrite. */
export type FixedFieldName = 'description' | 'preconditions' | 'postconditions' | 'steps' | 'custom_fields';

export type FieldCounts = Record<FixedFieldName, number>;
