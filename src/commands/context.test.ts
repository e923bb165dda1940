import { describe, it, expect, afterEach, vi } from 'vitest';
import { parseId, reportError, runCommand } from './context.js';
import { NotFoundError, ValidationError } from '../core/errors.js';

describe('command helpers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should parse ids with or without a leading #', () => {
    expect(parseId('12')).toBe(12);
    expect(parseId('#7')).toBe(7);
    expect(parseId(' 3 ')).toBe(3);
  });

  it('should reject ids that are not positive integers', () => {
    for (const bad of ['0', '-1', '1.5', 'abc', '', '#']) {
      expect(() => parseId(bad)).toThrow(ValidationError);
    }
    expect(() => parseId('x', 'blocker')).toThrow('Invalid blocker "x"');
  });

  it('should report errors as JSON with exit code 1', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    reportError(new NotFoundError('issue', 4), true);

    expect(log).toHaveBeenCalledWith(
      JSON.stringify({ error: { code: 'NOT_FOUND', message: 'Issue #4 not found', retryable: false } })
    );
    expect(process.exitCode).toBe(1);
  });

  it('should catch failures of a command body', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await runCommand({}, () => {
      throw new Error('boom');
    });

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toContain('Error: boom');
    expect(process.exitCode).toBe(1);
  });
});
