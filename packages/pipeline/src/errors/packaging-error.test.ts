import { describe, expect, test } from 'vitest';

import { PackagingError } from './packaging-error';

describe('PackagingError', () => {
  test('should set name and message', () => {
    const error = new PackagingError('disk full');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('PackagingError');
    expect(error.message).toBe('disk full');
  });

  test('fromError should prefix context and keep the cause', () => {
    const cause = new Error('EACCES: permission denied');

    const error = PackagingError.fromError('Failed to write /out/a.md', cause);

    expect(error.message).toBe(
      'Failed to write /out/a.md: EACCES: permission denied',
    );
    expect(error.cause).toBe(cause);
  });

  test('getErrorMessage should stringify non-errors', () => {
    expect(PackagingError.getErrorMessage('plain')).toBe('plain');
    expect(PackagingError.getErrorMessage(42)).toBe('42');
  });
});
