import { QaseClient } from '../services/qase';
import { analyzeCsvReferences, countBrokenCsvReferences } from '../transforms/csv-references';
import { RunOptions } from '../types';
import { runTextFix, TextFixJob, TextFixStats } from './text-fix';

export const csvReferencesJob: TextFixJob = {
  subject: 'broken CSV references',
  analyze: analyzeCsvReferences,
  inspect: countBrokenCsvReferences,
};

/**
 * Turn CSV attachments that were imported as images (`![file.csv](url)`)
 * back into links (`[file.csv](url)`).
 */
export function fixCsvReferencesInProject(client: QaseClient, options: RunOptions): Promise<TextFixStats> {
  return runTextFix(client, csvReferencesJob, options);
}
