import { TestCase, TestCaseUpdate } from '../types';
import { analyzeTestCase } from './test-case-fields';

/**
 * Remove HTML tags while keeping line breaks: each line is trimmed with
 * inner runs of spaces and tabs collapsed, and blank-line runs are capped
 * at one empty line.
 */
export function stripHtmlTags(text: string): string {
  if (!text) return text;

  const withoutTags = text.replace(/<[^>]+>/g, '');
  const lines = withoutTags.split('\n').map((line) => line.trim().replace(/[ \t]+/g, ' '));

  return lines.join('\n').replace(/\n{3,}/g, '\n\n').trim();
}

export function fixHtmlTags(text: string): string | null {
  const cleaned = stripHtmlTags(text);
  return cleaned !== text ? cleaned : null;
}

export function analyzeHtmlTags(testCase: TestCase): TestCaseUpdate {
  return analyzeTestCase(testCase, fixHtmlTags);
}
