import type { ChildProcess } from 'node:child_process';

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { constants } from 'node:os';
import { Readable } from 'node:stream';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { spawnAsync } from './spawn-utils';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

const spawnMock = vi.mocked(spawn);

interface MockProcess {
  proc: ChildProcess;
  stdout: Readable;
  stderr: Readable;
}

function createMockProcess(options?: {
  hasStdout?: boolean;
  hasStderr?: boolean;
}): MockProcess {
  const emitter = new EventEmitter();
  const proc = emitter as unknown as ChildProcess;
  const stdout = new Readable({ read() {} });
  const stderr = new Readable({ read() {} });

  proc.stdout = options?.hasStdout === false ? null : stdout;
  proc.stderr = options?.hasStderr === false ? null : stderr;

  return { proc, stdout, stderr };
}

describe('spawnAsync', () => {
  let mock: MockProcess;

  beforeEach(() => {
    mock = createMockProcess();
    spawnMock.mockReturnValue(mock.proc);
  });

  test('should resolve with decoded stdout, stderr and exit code', async () => {
    const { proc, stdout, stderr } = mock;

    const promise = spawnAsync('pdfinfo', ['report.pdf']);

    stdout.emit('data', Buffer.from('Pages: 3'));
    stderr.emit('data', Buffer.from('warning'));
    proc.emit('close', 0);

    const result = await promise;

    expect(spawnMock).toHaveBeenCalledWith('pdfinfo', ['report.pdf'], {});
    expect(result).toEqual({
      stdout: 'Pages: 3',
      stderr: 'warning',
      code: 0,
    });
  });

  test('should pass spawn options to child_process.spawn', async () => {
    const { proc } = mock;
    const controller = new AbortController();

    const promise = spawnAsync('pdftotext', ['-layout', 'a.pdf', '-'], {
      cwd: '/custom/path',
      signal: controller.signal,
    });

    proc.emit('close', 0);

    await promise;

    expect(spawnMock).toHaveBeenCalledWith(
      'pdftotext',
      ['-layout', 'a.pdf', '-'],
      { cwd: '/custom/path', signal: controller.signal },
    );
  });

  test('should not capture stdout when captureStdout is false', async () => {
    const { proc, stdout } = mock;

    const promise = spawnAsync('cmd', [], { captureStdout: false });

    stdout.emit('data', Buffer.from('ignored'));
    proc.emit('close', 0);

    const result = await promise;

    expect(result.stdout).toBe('');
  });

  test('should not capture stderr when captureStderr is false', async () => {
    const { proc, stderr } = mock;

    const promise = spawnAsync('cmd', [], { captureStderr: false });

    stderr.emit('data', Buffer.from('ignored'));
    proc.emit('close', 0);

    const result = await promise;

    expect(result.stderr).toBe('');
  });

  test('should handle process without output streams', async () => {
    const { proc } = createMockProcess({ hasStdout: false, hasStderr: false });
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', []);

    proc.emit('close', 0);

    const result = await promise;

    expect(result.stdout).toBe('');
    expect(result.stderr).toBe('');
  });

  test('should report a killed process as a failure with its signal', async () => {
    const { proc, stdout } = mock;

    const promise = spawnAsync('pdftotext', ['a.pdf', '-']);

    stdout.emit('data', Buffer.from('partial'));
    proc.emit('close', null, 'SIGSEGV');

    await expect(promise).resolves.toEqual({
      stdout: 'partial',
      stderr: '',
      code: 128 + constants.signals.SIGSEGV,
      signal: 'SIGSEGV',
    });
  });

  test('should leave signal unset on a normal exit', async () => {
    const { proc } = mock;

    const promise = spawnAsync('cmd', []);

    proc.emit('close', 0, null);

    const result = await promise;

    expect(result.signal).toBeUndefined();
    expect(result.code).toBe(0);
  });

  test('should never report 0 when neither code nor signal is known', async () => {
    const { proc } = mock;

    const promise = spawnAsync('cmd', []);

    proc.emit('close', null, null);

    await expect(promise).resolves.toMatchObject({ code: 128 });
  });

  test('should resolve, not reject, on a non-zero exit code', async () => {
    const { proc } = mock;

    const promise = spawnAsync('cmd', []);

    proc.emit('close', 1);

    await expect(promise).resolves.toMatchObject({ code: 1 });
  });

  test('should reject when the command cannot be started', async () => {
    const { proc } = mock;

    const promise = spawnAsync('nonexistent', []);

    proc.emit('error', new Error('spawn nonexistent ENOENT'));

    await expect(promise).rejects.toThrow('spawn nonexistent ENOENT');
  });

  test('should concatenate chunks in arrival order', async () => {
    const { proc, stdout, stderr } = mock;

    const promise = spawnAsync('cmd', []);

    stdout.emit('data', Buffer.from('chunk1'));
    stdout.emit('data', Buffer.from('chunk2'));
    stderr.emit('data', Buffer.from('err1'));
    stderr.emit('data', Buffer.from('err2'));
    proc.emit('close', 0);

    const result = await promise;

    expect(result.stdout).toBe('chunk1chunk2');
    expect(result.stderr).toBe('err1err2');
  });

  test('should decode multi-byte characters split across chunks', async () => {
    const { proc, stdout } = mock;

    const promise = spawnAsync('cmd', []);

    // "é" is 0xC3 0xA9 in UTF-8
    stdout.emit('data', Buffer.from([0x63, 0x61, 0x66, 0xc3]));
    stdout.emit('data', Buffer.from([0xa9]));
    proc.emit('close', 0);

    const result = await promise;

    expect(result.stdout).toBe('café');
  });
});
