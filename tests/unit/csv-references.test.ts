import { describe, expect, it } from 'vitest';
import {
  analyzeCsvReferences,
  countBrokenCsvReferences,
  findBrokenCsvReferences,
  fixCsvReferences,
} from '../../src/transforms/csv-references';

describe('findBrokenCsvReferences', () => {
  it('pairs an image-style CSV reference with its link form', () => {
    expect(findBrokenCsvReferences('See ![data.csv](https://files.example.test/data.csv) here')).toEqual([
      {
        broken: '![data.csv](https://files.example.test/data.csv)',
        fixed: '[data.csv](https://files.example.test/data.csv)',
      },
    ]);
  });

  it('ignores images that are not CSV files', () => {
    expect(findBrokenCsvReferences('![screenshot.png](https://files.example.test/s.png)')).toEqual([]);
  });

  it('returns nothing for empty input', () => {
    expect(findBrokenCsvReferences(null)).toEqual([]);
    expect(findBrokenCsvReferences('')).toEqual([]);
  });
});

describe('fixCsvReferences', () => {
  it('drops the escaped bang in front of a CSV reference', () => {
    expect(fixCsvReferences('\\![report.csv](https://x.test/r.csv)')).toBe('[report.csv](https://x.test/r.csv)');
  });

  it('unescapes fully escaped references', () => {
    const text = '\\!\\[data\\_set\\.csv\\]\\(https://x.test/a\\_b\\.csv\\)';
    expect(fixCsvReferences(text)).toBe('[data_set.csv](https://x.test/a_b.csv)');
  });

  it('replaces every occurrence of the same reference', () => {
    expect(fixCsvReferences('![a.csv](u) and ![a.csv](u)')).toBe('[a.csv](u) and [a.csv](u)');
  });

  it('returns null when nothing changes', () => {
    expect(fixCsvReferences('[a.csv](u) is already a link')).toBeNull();
    expect(fixCsvReferences(undefined)).toBeNull();
  });
});

describe('analyzeCsvReferences', () => {
  it('returns only the fields that need rewriting', () => {
    const updates = analyzeCsvReferences({
      id: 1,
      description: 'Input: ![in.csv](https://x.test/in.csv)',
      preconditions: 'nothing to fix',
      steps: [
        { position: 1, hash: 'h1', action: 'Open ![a.csv](u1)', expected_result: 'ok', data: null },
        { position: 2, action: 'Click' },
      ],
      custom_fields: [
        { id: 7, value: '![b.csv](u2)' },
        { id: 8, value: 'fine' },
      ],
    });

    expect(updates).toEqual({
      description: 'Input: [in.csv](https://x.test/in.csv)',
      steps: [
        { position: 1, hash: 'h1', action: 'Open [a.csv](u1)', expected_result: 'ok' },
        { position: 2, action: 'Click' },
      ],
      custom_field: { '7': '[b.csv](u2)' },
    });
  });

  it('fixes references inside nested steps', () => {
    const updates = analyzeCsvReferences({
      id: 4,
      steps: [{ hash: 'p', action: 'Group', steps: [{ hash: 'c', action: '![a.csv](u)' }] }],
    });

    expect(updates).toEqual({
      steps: [{ hash: 'p', action: 'Group', steps: [{ hash: 'c', action: '[a.csv](u)' }] }],
    });
  });

  it('returns an empty update for a clean case', () => {
    expect(analyzeCsvReferences({ id: 2, description: 'clean', steps: [{ action: 'Click' }] })).toEqual({});
  });
});

describe('countBrokenCsvReferences', () => {
  it('counts references per field', () => {
    expect(
      countBrokenCsvReferences({
        id: 3,
        description: '![a.csv](u) ![b.csv](v)',
        steps: [{ action: '![c.csv](w)', expected_result: '![d.csv](x)' }],
        custom_fields: [{ id: 1, value: null }],
      })
    ).toEqual({ desc: 2, prec: 0, postc: 0, steps: 2, custom: 0 });
  });
});
