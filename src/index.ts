export * from './types';
export * from './config';
export { QaseApiClient, MAX_PAGE_SIZE } from './services/qase';
export type { QaseClient } from './services/qase';
export { QaseApiError, ConfigError } from './utils/errors';
export { logger, serializeError } from './utils/logger';

export { findBrokenCsvReferences, fixCsvReferences, analyzeCsvReferences } from './transforms/csv-references';
export { stripHtmlTags, analyzeHtmlTags } from './transforms/html-tags';
export {
  removeAttachmentReferences,
  ensureStepHasAction,
  analyzeAttachmentReferences,
} from './transforms/attachment-references';
export { extractJiraIssueIds, extractFromTestCase } from './transforms/jira-ids';

export { runTextFix } from './operations/text-fix';
export type { TextFixStats } from './operations/text-fix';
export { fixCsvReferencesInProject } from './operations/fix-csv-references';
export { fixHtmlTagsInProject } from './operations/fix-html-tags';
export { removeAttachmentReferencesInProject } from './operations/remove-attachment-references';
export { migrateField } from './operations/migrate-field';
export type { FieldMigrationStats } from './operations/migrate-field';
export { linkJiraIssues } from './operations/link-jira-issues';
export type { JiraLinkStats } from './operations/link-jira-issues';
export { updateFieldFromCsv, loadCsvData } from './operations/update-field-from-csv';
export type { CsvUpdateStats } from './operations/update-field-from-csv';
export { deleteAllCustomFields } from './operations/delete-custom-fields';
export type { DeletionStats } from './operations/delete-custom-fields';
export { deleteAttachmentsBySize } from './operations/delete-attachments';
