import { describe, expect, test } from 'vitest';

import { countWords } from './text-stats';

describe('countWords', () => {
  test('should count words and ignore markup tokens', () => {
    expect(countWords('# Title\n\n- one two\n1. three\n\n| a | b |\n| --- | --- |')).toBe(
      6,
    );
  });

  test('should return 0 for empty text', () => {
    expect(countWords('')).toBe(0);
    expect(countWords('   \n ')).toBe(0);
  });

  test('should count non-latin words', () => {
    expect(countWords('données déjà traitées')).toBe(3);
  });
});
