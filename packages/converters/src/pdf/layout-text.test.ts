import { describe, expect, test } from 'vitest';

import { findUrls, layoutTextToMarkdown } from './layout-text';

describe('layoutTextToMarkdown', () => {
  test('should split paragraphs on blank lines and detect aligned tables', () => {
    const page = [
      'Quarterly Report',
      '  The results are in.',
      '',
      'Region    Q1    Q2',
      'North     10    12',
      'South     8     9',
      '',
      'See https://example.com/report.',
    ].join('\n');

    expect(layoutTextToMarkdown(page)).toEqual([
      'Quarterly Report The results are in.',
      [
        '| Region | Q1 | Q2 |',
        '| --- | --- | --- |',
        '| North | 10 | 12 |',
        '| South | 8 | 9 |',
      ].join('\n'),
      'See https://example.com/report.',
    ]);
  });

  test('should fold a single aligned line into the paragraph', () => {
    const page = 'Name    Value\nplain text follows';

    expect(layoutTextToMarkdown(page)).toEqual([
      'Name Value plain text follows',
    ]);
  });

  test('should start a new table when the column count changes', () => {
    const page = 'a  b\nc  d\ne  f  g\nh  i  j';

    expect(layoutTextToMarkdown(page)).toEqual([
      '| a | b |\n| --- | --- |\n| c | d |',
      '| e | f | g |\n| --- | --- | --- |\n| h | i | j |',
    ]);
  });

  test('should honor minTableRows and columnGap', () => {
    const page = 'a   b\nc   d';

    expect(layoutTextToMarkdown(page, { minTableRows: 3 })).toEqual([
      'a b c d',
    ]);
    expect(layoutTextToMarkdown('a  b\nc  d', { columnGap: 3 })).toEqual([
      'a b c d',
    ]);
  });

  test('should return no blocks for whitespace-only text', () => {
    expect(layoutTextToMarkdown('  \n\n   \n')).toEqual([]);
  });
});

describe('findUrls', () => {
  test('should return unique urls without trailing punctuation', () => {
    const text =
      'Visit https://example.com/a, then http://example.org/b. Again https://example.com/a';

    expect(findUrls(text)).toEqual([
      'https://example.com/a',
      'http://example.org/b',
    ]);
  });

  test('should return empty array when there are no urls', () => {
    expect(findUrls('no links here')).toEqual([]);
  });
});
