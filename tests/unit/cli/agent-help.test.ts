import { describe, test, expect } from 'vitest';
import { agentHelpFor, allCommands, extractAgentHelpFlag } from '../../../src/cli/agent-help.js';

describe('extractAgentHelpFlag', () => {
  test('returns agentHelp false when flag is absent', () => {
    const result = extractAgentHelpFlag(['marketplace', 'add']);
    expect(result.agentHelp).toBe(false);
    expect(result.args).toEqual(['marketplace', 'add']);
  });

  test('strips --agent-help from any position', () => {
    expect(extractAgentHelpFlag(['--agent-help', 'marketplace', 'add'])).toEqual({
      args: ['marketplace', 'add'],
      agentHelp: true,
    });
    expect(extractAgentHelpFlag(['marketplace', '--agent-help', 'add'])).toEqual({
      args: ['marketplace', 'add'],
      agentHelp: true,
    });
  });
});

describe('agent command metadata', () => {
  test('contains exactly 6 commands', () => {
    expect(allCommands.map((c) => c.command)).toEqual([
      'marketplace add',
      'marketplace remove',
      'marketplace list',
      'marketplace show',
      'marketplace prune',
      'config show',
    ]);
  });

  test('every command has examples that invoke it', () => {
    for (const meta of allCommands) {
      expect(meta.examples.length).toBeGreaterThan(0);
      for (const example of meta.examples) {
        expect(example.startsWith(`nova ${meta.command}`)).toBe(true);
      }
    }
  });

  test('every command documents --working-dir', () => {
    for (const meta of allCommands) {
      expect(meta.options?.some((o) => o.flag === '--working-dir')).toBe(true);
    }
  });
});

describe('agentHelpFor', () => {
  test('returns the full tree for an empty path', () => {
    const help = agentHelpFor([], '1.2.3');
    expect(help?.name).toBe('nova');
    expect(help?.version).toBe('1.2.3');
    const commands = help?.commands;
    expect(Array.isArray(commands) ? commands.length : -1).toBe(6);
  });

  test('returns a single command for an exact path', () => {
    const help = agentHelpFor(['marketplace', 'add'], '1.2.3');
    expect(help?.command).toBe('marketplace add');
    expect(help?.when_to_use).toBe('To install a bundle catalog and record it in one config scope');
  });

  test('ignores flags in the command path', () => {
    expect(agentHelpFor(['config', 'show', '--json'], '1.2.3')?.command).toBe('config show');
  });

  test('returns a group for a prefix', () => {
    const help = agentHelpFor(['marketplace'], '1.2.3');
    expect(help?.name).toBe('marketplace');
    const commands = help?.commands;
    expect(Array.isArray(commands) ? commands.length : -1).toBe(5);
  });

  test('returns null for an unknown command', () => {
    expect(agentHelpFor(['plugin', 'install'], '1.2.3')).toBeNull();
  });
});
