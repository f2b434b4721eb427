import { describe, expect, test } from 'vitest';

import { escapeTableCell, renderMarkdownTable } from './markdown-table';

describe('renderMarkdownTable', () => {
  test('should render header, separator and body rows', () => {
    const markdown = renderMarkdownTable([
      ['Chapter', 'Page'],
      ['Introduction', '1'],
      ['Methodology', '10'],
    ]);

    expect(markdown).toBe(
      [
        '| Chapter | Page |',
        '| --- | --- |',
        '| Introduction | 1 |',
        '| Methodology | 10 |',
      ].join('\n'),
    );
  });

  test('should pad short rows to the widest row', () => {
    const markdown = renderMarkdownTable([['A', 'B', 'C'], ['1']]);

    expect(markdown).toBe('| A | B | C |\n| --- | --- | --- |\n| 1 |  |  |');
  });

  test('should skip empty rows and return empty string for no rows', () => {
    expect(renderMarkdownTable([])).toBe('');
    expect(renderMarkdownTable([[], []])).toBe('');
    expect(renderMarkdownTable([[], ['x']])).toBe('| x |\n| --- |');
  });
});

describe('escapeTableCell', () => {
  test('should escape pipes and collapse newlines', () => {
    expect(escapeTableCell(' a|b \n  c ')).toBe('a\\|b c');
  });
});
