import { FieldCounts, TestCase, TestCaseUpdate, TestStep } from '../types';

/**
 * Rewrites one text value. Returns `null` when the text needs no change.
 */
export type TextFix = (text: string) => string | null;

const SCALAR_FIELDS = ['description', 'preconditions', 'postconditions'] as const;
const STEP_TEXT_FIELDS = ['action', 'expected_result', 'data'] as const;

function applyFix(fix: TextFix, value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? fix(value) : null;
}

function fixStep(step: TestStep, fix: TextFix): { step: TestStep; changed: boolean } {
  const fixedStep: TestStep = { ...step };
  let changed = false;

  for (const field of STEP_TEXT_FIELDS) {
    const value = step[field];
    const fixed = applyFix(fix, value);
    if (fixed !== null) {
      fixedStep[field] = fixed;
      changed = true;
    } else if (!value) {
      delete fixedStep[field];
    }
  }

  if (step.steps && step.steps.length > 0) {
    fixedStep.steps = step.steps.map((nested) => {
      const result = fixStep(nested, fix);
      changed = changed || result.changed;
      return result.step;
    });
  }

  return { step: fixedStep, changed };
}

/**
 * Rebuild the step list when any step text changes, nested steps included.
 * Steps are sent whole because a PATCH replaces the list; empty text fields
 * are left out.
 */
export function fixStepTexts(steps: TestStep[] | undefined, fix: TextFix): TestStep[] | undefined {
  if (!steps || steps.length === 0) return undefined;

  let changed = false;
  const fixedSteps = steps.map((step) => {
    const result = fixStep(step, fix);
    changed = changed || result.changed;
    return result.step;
  });

  return changed ? fixedSteps : undefined;
}

/**
 * Custom field values that change, keyed by field ID as the API expects.
 */
export function fixCustomFieldValues(testCase: TestCase, fix: TextFix): Record<string, string> | undefined {
  const updates: Record<string, string> = {};
  for (const field of testCase.custom_fields ?? []) {
    const fixed = applyFix(fix, field.value);
    if (fixed !== null && field.id !== undefined && field.id !== null) {
      updates[String(field.id)] = fixed;
    }
  }
  return Object.keys(updates).length > 0 ? updates : undefined;
}

export type StepFixer = (steps: TestStep[] | undefined, fix: TextFix) => TestStep[] | undefined;

/**
 * Apply a text fix to every text field of a test case and return only the
 * fields that need writing back. An empty object means nothing to do.
 */
export function analyzeTestCase(testCase: TestCase, fix: TextFix, fixSteps: StepFixer = fixStepTexts): TestCaseUpdate {
  const updates: TestCaseUpdate = {};

  for (const field of SCALAR_FIELDS) {
    const fixed = applyFix(fix, testCase[field]);
    if (fixed !== null) {
      updates[field] = fixed;
    }
  }

  const steps = fixSteps(testCase.steps, fix);
  if (steps) {
    updates.steps = steps;
  }

  const customField = fixCustomFieldValues(testCase, fix);
  if (customField) {
    updates.custom_field = customField;
  }

  return updates;
}

export function emptyFieldCounts(): FieldCounts {
  return { description: 0, preconditions: 0, postconditions: 0, steps: 0, custom_fields: 0 };
}

/**
 * Tally which fields an update touches. Custom fields count per field.
 */
export function countFixedFields(counts: FieldCounts, updates: TestCaseUpdate): void {
  if (updates.description !== undefined) counts.description++;
  if (updates.preconditions !== undefined) counts.preconditions++;
  if (updates.postconditions !== undefined) counts.postconditions++;
  if (updates.steps !== undefined) counts.steps++;
  if (updates.custom_field !== undefined) counts.custom_fields += Object.keys(updates.custom_field).length;
}
