import { QaseClient } from '../services/qase';
import { analyzeHtmlTags } from '../transforms/html-tags';
import { RunOptions } from '../types';
import { runTextFix, TextFixJob, TextFixStats } from './text-fix';

export const htmlTagsJob: TextFixJob = {
  subject: 'HTML tags',
  analyze: analyzeHtmlTags,
};

export function fixHtmlTagsInProject(client: QaseClient, options: RunOptions): Promise<TextFixStats> {
  return runTextFix(client, htmlTagsJob, options);
}
