import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './utils/errors';
import { EXTERNAL_ISSUE_TYPES, ExternalIssueType } from './types';

// Load environment variables
dotenv.config();

export const DEFAULT_BASE_URL = 'https://api.qase.io/v1';
export const DEFAULT_CONFIG_PATH = 'config.json';
export const DEFAULT_BATCH_SIZE = 50;
export const DEFAULT_EXTERNAL_ISSUE_TYPE: ExternalIssueType = 'jira-cloud';
export const DEFAULT_REFS_FIELD = 'refs';
export const DEFAULT_CSV_FIELD = 'Postconditions';

/**
 * Coerce a field ID from the config file. Numeric strings are accepted;
 * anything else is treated as "not configured".
 */
export function toFieldId(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const parsed = parseInt(value.trim(), 10);
    return parsed > 0 ? parsed : undefined;
  }
  return undefined;
}

const fieldId = z.unknown().transform(toFieldId);

const fileConfigSchema = z
  .object({
    api_token: z.string().optional(),
    project_code: z.string().optional(),
    base_url: z.string().url().optional(),
    source_field: z.string().optional(),
    destination_field: z.string().optional(),
    destination_field_id: fieldId,
    jira_refs_field: z.string().optional(),
    jira_refs_field_id: fieldId,
    csv_field_name: z.string().optional(),
    csv_update_field: z.string().optional(),
    csv_field_id: fieldId,
    csv_update_field_id: fieldId,
    csv_column_name: z.string().optional(),
    tests: z
      .object({
        external_issues: z
          .object({
            type: z.enum(['jira-cloud', 'jira-server']).optional(),
            batch_size: z.number().int().positive().optional(),
          })
          .optional(),
      })
      .optional(),
  })
  .passthrough();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Read and validate a JSON config file.
 */
export function loadConfigFile(configPath: string): FileConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(
      `Config file '${configPath}' not found. Please create it with 'api_token' and 'project_code' fields.`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file '${configPath}' is not valid JSON: ${reason}`);
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Config file '${configPath}' is invalid: ${issues.join('; ')}`);
  }
  return parsed.data;
}

function firstPresent(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim().length > 0)?.trim();
}

export interface ConnectionOverrides {
  config?: string;
  token?: string;
  project?: string;
}

export interface ResolvedConfig {
  apiToken: string;
  projectCode: string;
  baseUrl: string;
  configPath: string;
  file: FileConfig;
}

/**
 * Resolve API credentials. Priority: CLI flag, config file, environment.
 * A missing config file only matters when it leaves the token or project
 * code unresolved; an unreadable or invalid one always throws.
 */
export function resolveConfig(
  overrides: ConnectionOverrides,
  env: NodeJS.ProcessEnv = process.env,
  options: { requireProject?: boolean } = {}
): ResolvedConfig {
  const requireProject = options.requireProject ?? true;
  const configPath = overrides.config || DEFAULT_CONFIG_PATH;

  // Only an absent file may be made up for by flags or the environment;
  // a file that exists must parse, or its other settings would be lost.
  const fileExists = fs.existsSync(path.resolve(configPath));
  const file: FileConfig = fileExists ? loadConfigFile(configPath) : {};

  const apiToken = firstPresent(overrides.token, file.api_token, env.QASE_API_TOKEN);
  const projectCode = firstPresent(overrides.project, file.project_code, env.QASE_PROJECT_CODE);
  const baseUrl = firstPresent(file.base_url, env.QASE_API_URL) ?? DEFAULT_BASE_URL;

  const hint = fileExists ? '' : ` (config file '${configPath}' not found)`;
  if (!apiToken) {
    throw new ConfigError(
      `API token is required: provide --token, 'api_token' in ${configPath} or QASE_API_TOKEN${hint}`
    );
  }
  if (!projectCode && requireProject) {
    throw new ConfigError(
      `Project code is required: provide --project, 'project_code' in ${configPath} or QASE_PROJECT_CODE${hint}`
    );
  }

  return {
    apiToken,
    projectCode: projectCode ?? '',
    baseUrl: baseUrl.replace(/\/+$/, ''),
    configPath,
    file,
  };
}

// Per-operation settings. CLI values win over the config file.

export interface FieldMigrationSettings {
  sourceField: string;
  destinationField: string;
  destinationFieldId?: number;
}

export function resolveFieldMigrationSettings(
  cli: { sourceField?: string; destinationField?: string; destinationFieldId?: number },
  file: FileConfig
): FieldMigrationSettings {
  const sourceField = firstPresent(cli.sourceField, file.source_field);
  const destinationField = firstPresent(cli.destinationField, file.destination_field);

  if (!sourceField) {
    throw new ConfigError(
      "Source field name is required (provide via --source-field or set 'source_field' in config.json)"
    );
  }
  if (!destinationField) {
    throw new ConfigError(
      "Destination field name is required (provide via --destination-field or set 'destination_field' in config.json)"
    );
  }

  return {
    sourceField,
    destinationField,
    destinationFieldId: cli.destinationFieldId ?? file.destination_field_id,
  };
}

export interface JiraLinkSettings {
  externalIssueType: ExternalIssueType;
  batchSize: number;
  refsFieldName: string;
  refsFieldId?: number;
}

export function isExternalIssueType(value: string): value is ExternalIssueType {
  return (EXTERNAL_ISSUE_TYPES as readonly string[]).includes(value);
}

export function resolveJiraLinkSettings(
  cli: { type?: string; batchSize?: number; refsField?: string; refsFieldId?: number },
  file: FileConfig
): JiraLinkSettings {
  const externalIssues = file.tests?.external_issues;
  const type = cli.type ?? externalIssues?.type ?? DEFAULT_EXTERNAL_ISSUE_TYPE;
  if (!isExternalIssueType(type)) {
    throw new ConfigError(`Unsupported external issue type '${type}' (expected ${EXTERNAL_ISSUE_TYPES.join(' or ')})`);
  }

  const batchSize = cli.batchSize ?? externalIssues?.batch_size ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  return {
    externalIssueType: type,
    batchSize,
    refsFieldName: firstPresent(cli.refsField, file.jira_refs_field) ?? DEFAULT_REFS_FIELD,
    refsFieldId: cli.refsFieldId ?? file.jira_refs_field_id,
  };
}

export interface CsvUpdateSettings {
  fieldName: string;
  fieldId?: number;
  csvColumn: string;
}

export function resolveCsvUpdateSettings(
  cli: { fieldName?: string; fieldId?: number; csvColumn?: string },
  file: FileConfig
): CsvUpdateSettings {
  const fieldName = firstPresent(cli.fieldName, file.csv_field_name, file.csv_update_field) ?? DEFAULT_CSV_FIELD;
  return {
    fieldName,
    fieldId: cli.fieldId ?? file.csv_field_id ?? file.csv_update_field_id,
    csvColumn: firstPresent(cli.csvColumn, file.csv_column_name) ?? fieldName,
  };
}
