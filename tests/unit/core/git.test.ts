import { describe, it, expect } from 'vitest';
import { classifyCloneError, GitCloneError } from '../../../src/core/git.js';

const URL = 'https://github.com/acme/bundles.git';

describe('classifyCloneError', () => {
  it('should flag timeouts', () => {
    const error = classifyCloneError(new Error('block timeout reached'), URL, 60_000);
    expect(error).toBeInstanceOf(GitCloneError);
    expect(error.isTimeout).toBe(true);
    expect(error.isAuthError).toBe(false);
    expect(error.message.split('\n')[0]).toBe(`Clone timed out after 60s for ${URL}.`);
  });

  it.each([
    'fatal: Authentication failed for repo',
    'fatal: could not read Username for https://github.com',
    'git@github.com: Permission denied (publickey).',
    'remote: Repository not found.',
  ])('should flag auth failures: %s', (message) => {
    const error = classifyCloneError(new Error(message), URL, 60_000);
    expect(error.isAuthError).toBe(true);
    expect(error.isTimeout).toBe(false);
    expect(error.message.split('\n')[0]).toBe(`Authentication failed for ${URL}.`);
  });

  it('should wrap other failures with the git message', () => {
    const cause = new Error('fatal: destination path already exists');
    const error = classifyCloneError(cause, URL, 60_000);
    expect(error.isTimeout).toBe(false);
    expect(error.isAuthError).toBe(false);
    expect(error.message).toBe(`Failed to clone ${URL}: fatal: destination path already exists`);
    expect(error.cause).toBe(cause);
    expect(error.url).toBe(URL);
  });

  it('should accept non-Error values', () => {
    const error = classifyCloneError('boom', URL, 1000);
    expect(error.message).toBe(`Failed to clone ${URL}: boom`);
  });
});
