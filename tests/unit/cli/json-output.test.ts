import { describe, test, expect } from 'vitest';
import { extractJsonFlag } from '../../../src/cli/json-output.js';
import { extractFlag } from '../../../src/cli/flags.js';

describe('extractJsonFlag', () => {
  test('returns json false when flag is absent', () => {
    const result = extractJsonFlag(['marketplace', 'list']);
    expect(result.json).toBe(false);
    expect(result.args).toEqual(['marketplace', 'list']);
  });

  test('strips --json from end of args', () => {
    const result = extractJsonFlag(['marketplace', 'list', '--json']);
    expect(result.json).toBe(true);
    expect(result.args).toEqual(['marketplace', 'list']);
  });

  test('strips --json from beginning of args', () => {
    const result = extractJsonFlag(['--json', 'marketplace', 'list']);
    expect(result.json).toBe(true);
    expect(result.args).toEqual(['marketplace', 'list']);
  });

  test('strips --json from middle of args', () => {
    const result = extractJsonFlag(['marketplace', '--json', 'list']);
    expect(result.json).toBe(true);
    expect(result.args).toEqual(['marketplace', 'list']);
  });
});

describe('extractFlag', () => {
  test('removes every occurrence', () => {
    expect(extractFlag(['--no-color', 'config', 'show', '--no-color'], '--no-color')).toEqual({
      args: ['config', 'show'],
      present: true,
    });
  });

  test('does not match flags that only share a prefix', () => {
    expect(extractFlag(['--json-pretty'], '--json')).toEqual({ args: ['--json-pretty'], present: false });
  });
});
