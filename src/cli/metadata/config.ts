import type { AgentCommandMeta } from '../help.js';

export const configShowMeta: AgentCommandMeta = {
  command: 'config show',
  description: 'Show the effective configuration, or one scope file',
  whenToUse: 'To check which settings apply after merging global, project and user scopes and NOVA_CONFIG__* overrides',
  examples: [
    'nova config show',
    'nova config show --scope project',
    'nova config show --format json',
  ],
  expectedOutput:
    'Prints the configuration as YAML (default) or JSON. Exit 1 if a scope file is invalid.',
  options: [
    {
      flag: '--scope',
      short: '-s',
      type: 'string',
      description: 'Show only this scope file, without merging or environment overrides',
      choices: ['global', 'project', 'user'],
    },
    { flag: '--format', short: '-f', type: 'string', description: 'Output format (default: yaml)', choices: ['yaml', 'json'] },
    {
      flag: '--working-dir',
      short: '-C',
      type: 'string',
      description: 'Directory to resolve the project from (default: cwd)',
    },
  ],
  outputSchema: {
    scope: 'global | project | user | null',
    path: 'string | null',
    config: 'object',
  },
};
