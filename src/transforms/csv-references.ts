import { TestCase, TestCaseUpdate } from '../types';
import { analyzeTestCase } from './test-case-fields';

export interface CsvReferenceFix {
  broken: string;
  fixed: string;
}

// ![name.csv](url), not preceded by a backslash
const IMAGE_REFERENCE = /(?<!\\)!\[([^\]]+\.csv[^\]]*)\]\(([^)]+)\)/g;
// \![name.csv](url): only the bang is escaped
const ESCAPED_BANG_REFERENCE = /\\!\[([^\]]+\.csv[^\]]*)\]\(([^)]+)\)/g;
// \!\[name\.csv\]\(url\): every markdown character is escaped
const FULLY_ESCAPED_REFERENCE = /\\!\\\[(.*?\.csv.*?)\\\]\\\((.*?)\\\)/g;

function unescapeName(raw: string): string {
  // \\ first so an escaped backslash never pairs with the next character
  return raw
    .replaceAll('\\\\', '\\')
    .replaceAll('\\_', '_')
    .replaceAll('\\(', '(')
    .replaceAll('\\)', ')')
    .replaceAll('\\.', '.');
}

function unescapeUrl(raw: string): string {
  return unescapeName(raw).replaceAll('\\/', '/');
}

/**
 * Find CSV attachments that were imported as images (`![file.csv](url)`)
 * and pair each with its plain-link form (`[file.csv](url)`).
 */
export function findBrokenCsvReferences(text: string | null | undefined): CsvReferenceFix[] {
  if (!text) return [];

  const fixes: CsvReferenceFix[] = [];

  for (const match of text.matchAll(IMAGE_REFERENCE)) {
    fixes.push({ broken: match[0], fixed: `[${match[1]}](${match[2]})` });
  }

  for (const match of text.matchAll(ESCAPED_BANG_REFERENCE)) {
    fixes.push({ broken: match[0], fixed: `[${match[1]}](${match[2]})` });
  }

  for (const match of text.matchAll(FULLY_ESCAPED_REFERENCE)) {
    fixes.push({ broken: match[0], fixed: `[${unescapeName(match[1])}](${unescapeUrl(match[2])})` });
  }

  return fixes;
}

/**
 * Returns the repaired text, or `null` when there is nothing to repair.
 */
export function fixCsvReferences(text: string | null | undefined): string | null {
  if (!text) return null;

  const fixes = findBrokenCsvReferences(text);
  if (fixes.length === 0) return null;

  let fixedText = text;
  for (const { broken, fixed } of fixes) {
    fixedText = fixedText.replaceAll(broken, fixed);
  }
  return fixedText !== text ? fixedText : null;
}

export function analyzeCsvReferences(testCase: TestCase): TestCaseUpdate {
  return analyzeTestCase(testCase, fixCsvReferences);
}

/**
 * Per-field count of broken references, for verbose output.
 */
export function countBrokenCsvReferences(testCase: TestCase): Record<string, number> {
  const steps = testCase.steps ?? [];
  return {
    desc: findBrokenCsvReferences(testCase.description).length,
    prec: findBrokenCsvReferences(testCase.preconditions).length,
    postc: findBrokenCsvReferences(testCase.postconditions).length,
    steps: steps.reduce(
      (sum, step) =>
        sum +
        findBrokenCsvReferences(step.action).length +
        findBrokenCsvReferences(step.expected_result).length +
        findBrokenCsvReferences(step.data).length,
      0
    ),
    custom: (testCase.custom_fields ?? []).reduce(
      (sum, field) => sum + findBrokenCsvReferences(field.value).length,
      0
    ),
  };
}
