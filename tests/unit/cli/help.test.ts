import { describe, test, expect } from 'vitest';
import { command } from 'cmd-ts';
import { commandHelp, renderGroupHelp, summaryLine } from '../../../src/cli/help.js';

describe('commandHelp', () => {
  test('joins summary, when-to-use, examples and output as paragraphs', () => {
    const text = commandHelp({
      command: 'show',
      description: 'Show things',
      whenToUse: 'When you want to see things',
      examples: ['nova show', 'nova show --json'],
      expectedOutput: 'A list of things',
    });

    expect(text).toBe(
      [
        'Show things',
        '',
        'When to use: When you want to see things',
        '',
        'Examples:',
        '  $ nova show',
        '  $ nova show --json',
        '',
        'Output: A list of things',
      ].join('\n'),
    );
  });

  test('lists the accepted values of restricted options before the output', () => {
    const text = commandHelp({
      command: 'config show',
      description: 'Show config',
      whenToUse: 'Always',
      examples: ['nova config show'],
      expectedOutput: 'YAML',
      options: [
        { flag: '--scope', type: 'string', description: 'Scope', choices: ['global', 'project', 'user'] },
        { flag: '--working-dir', type: 'string', description: 'Directory' },
        { flag: '--format', type: 'string', description: 'Format', choices: ['yaml', 'json'] },
      ],
    });

    expect(text.split('\n\n')).toEqual([
      'Show config',
      'When to use: Always',
      'Examples:\n  $ nova config show',
      'Accepted values:\n  --scope: global, project, user\n  --format: yaml, json',
      'Output: YAML',
    ]);
  });
});

describe('summaryLine', () => {
  test('keeps only the first line', () => {
    expect(summaryLine('Add a marketplace\n\nWhen to use: often')).toBe('Add a marketplace');
    expect(summaryLine(undefined)).toBe('');
  });
});

describe('renderGroupHelp', () => {
  const noop = async () => {};

  test('aligns child summaries under a usage line', () => {
    const text = renderGroupHelp('nova marketplace', {
      name: 'marketplace',
      description: 'Manage marketplaces',
      cmds: {
        add: command({ name: 'add', description: 'Add one\n\nWhen to use: now', args: {}, handler: noop }),
        prune: command({ name: 'prune', description: 'Clean up', args: {}, handler: noop }),
      },
    });

    expect(text).toBe(
      [
        'Usage: nova marketplace <command> [options]',
        '',
        'Manage marketplaces',
        '',
        'Commands:',
        '  add    Add one',
        '  prune  Clean up',
        '',
        "Run 'nova marketplace <command> --help' for details on a command.",
      ].join('\n'),
    );
  });

  test('leaves no trailing space for a child without a description', () => {
    const text = renderGroupHelp('nova config', {
      name: 'config',
      cmds: { show: command({ name: 'show', args: {}, handler: noop }) },
    });

    expect(text.split('\n')).toEqual([
      'Usage: nova config <command> [options]',
      '',
      'Commands:',
      '  show',
      '',
      "Run 'nova config <command> --help' for details on a command.",
    ]);
  });
});
