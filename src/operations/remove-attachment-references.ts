import { QaseClient } from '../services/qase';
import { analyzeAttachmentReferences, ensureStepHasAction } from '../transforms/attachment-references';
import { RunOptions } from '../types';
import { QaseApiError } from '../utils/errors';
import { logger } from '../utils/logger';
import { CaseUpdater, runTextFix, TextFixJob, TextFixStats } from './text-fix';

/**
 * PATCH the case; when Qase rejects it because a step lost its action,
 * fill every empty action with the placeholder and try once more.
 */
export const updateWithActionRetry: CaseUpdater = async (client, caseId, updates) => {
  try {
    await client.updateTestCase(caseId, updates);
    return undefined;
  } catch (error) {
    if (!(error instanceof QaseApiError) || !error.isMissingStepAction() || !updates.steps) {
      throw error;
    }
    logger.warn('Step action rejected, retrying with placeholder actions', { caseId });
    await client.updateTestCase(caseId, { ...updates, steps: updates.steps.map(ensureStepHasAction) });
    return 'patched empty actions';
  }
};

export const attachmentReferencesJob: TextFixJob = {
  subject: 'attachment references',
  analyze: analyzeAttachmentReferences,
  update: updateWithActionRetry,
};

export function removeAttachmentReferencesInProject(client: QaseClient, options: RunOptions): Promise<TextFixStats> {
  return runTextFix(client, attachmentReferencesJob, options);
}
