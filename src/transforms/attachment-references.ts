import { TestCase, TestCaseUpdate, TestStep } from '../types';
import { analyzeTestCase, TextFix } from './test-case-fields';

// [![attachment](url)](index.php?/attachments/get/123)
const LINKED_ATTACHMENT = /\[!\[attachment\]\([^)]+\)\]\(index\.php\?\/attachments\/get\/\d+\)/g;
// ![attachment](url)
const INLINE_ATTACHMENT = /!\[attachment\]\([^)]+\)/g;

/** Qase refuses steps without an action; this placeholder is sent instead. */
export const EMPTY_ACTION_PLACEHOLDER = '.';

export function removeAttachmentReferences(text: string): string {
  if (!text) return text;

  const cleaned = text.replace(LINKED_ATTACHMENT, '').replace(INLINE_ATTACHMENT, '');
  const lines = cleaned.split('\n').map((line) => line.replace(/ +/g, ' '));

  return lines.join('\n').replace(/\n{3,}/g, '\n\n').trim();
}

export function fixAttachmentReferences(text: string): string | null {
  const cleaned = removeAttachmentReferences(text);
  return cleaned !== text ? cleaned : null;
}

function hasAction(step: TestStep): boolean {
  return typeof step.action === 'string' && step.action.trim().length > 0;
}

/**
 * Copy of the step (and its nested steps) with every empty action replaced
 * by the placeholder.
 */
export function ensureStepHasAction(step: TestStep): TestStep {
  const fixed: TestStep = { ...step };
  if (!hasAction(fixed)) {
    fixed.action = EMPTY_ACTION_PLACEHOLDER;
  }
  if (fixed.steps && fixed.steps.length > 0) {
    fixed.steps = fixed.steps.map(ensureStepHasAction);
  }
  return fixed;
}

function fixStep(step: TestStep, fix: TextFix): { step: TestStep; changed: boolean } {
  const fixed: TestStep = { ...step };
  let changed = false;

  for (const field of ['action', 'expected_result', 'data'] as const) {
    const value = step[field];
    if (typeof value === 'string' && value.length > 0) {
      const cleaned = fix(value);
      if (cleaned !== null) {
        fixed[field] = cleaned;
        changed = true;
      }
    }
  }

  if (!hasAction(fixed)) {
    fixed.action = EMPTY_ACTION_PLACEHOLDER;
    changed = true;
  }

  if (step.steps && step.steps.length > 0) {
    fixed.steps = step.steps.map((nested) => {
      const result = fixStep(nested, fix);
      changed = changed || result.changed;
      return result.step;
    });
  }

  return { step: fixed, changed };
}

/**
 * Unlike plain text fixes, steps keep every property and nested steps are
 * walked, since removing an attachment can leave an action empty.
 */
export function fixNestedSteps(steps: TestStep[] | undefined, fix: TextFix): TestStep[] | undefined {
  if (!steps || steps.length === 0) return undefined;

  let changed = false;
  const fixedSteps = steps.map((step) => {
    const result = fixStep(step, fix);
    changed = changed || result.changed;
    return result.step;
  });

  return changed ? fixedSteps.map(ensureStepHasAction) : undefined;
}

export function analyzeAttachmentReferences(testCase: TestCase): TestCaseUpdate {
  return analyzeTestCase(testCase, fixAttachmentReferences, fixNestedSteps);
}
