import type { AgentCommandMeta, CommandOption } from '../help.js';

const scopeOption = (fallback: string): CommandOption => ({
  flag: '--scope',
  short: '-s',
  type: 'string',
  description: `Config scope (default: ${fallback})`,
  choices: ['global', 'project', 'user'],
});

const workingDirOption: CommandOption = {
  flag: '--working-dir',
  short: '-C',
  type: 'string',
  description: 'Directory to resolve the project and relative paths from (default: cwd)',
};

const detailsSchema = {
  name: 'string',
  description: 'string',
  source: { type: 'github | git | local', owner: 'string?', repo: 'string?', url: 'string?', path: 'string?' },
  bundleCount: 'number',
  scope: 'global | project | user',
  installPath: 'string | null',
  fetchedAt: 'string | null',
  status: 'installed | missing-state | missing-files',
};

export const marketplaceAddMeta: AgentCommandMeta = {
  command: 'marketplace add',
  description: 'Add a marketplace from a GitHub repo, git URL, or local directory',
  whenToUse: 'To install a bundle catalog and record it in one config scope',
  examples: [
    'nova marketplace add acme/bundles',
    'nova marketplace add https://git.example.com/team/bundles.git --scope project',
    'nova marketplace add ./local-marketplace --scope user',
  ],
  expectedOutput:
    'Confirms the marketplace name, scope and bundle count. Exit 1 if the source is invalid, unreachable, has no valid marketplace.json, or is already configured. Exit 130 if interrupted before anything was installed.',
  positionals: [
    { name: 'source', type: 'string', required: true, description: 'owner/repo, git URL, or path to a local directory' },
  ],
  options: [scopeOption('global'), workingDirOption],
  outputSchema: {
    marketplace: { name: 'string', description: 'string', source: 'object', bundleCount: 'number' },
    scope: 'global | project | user',
  },
};

export const marketplaceRemoveMeta: AgentCommandMeta = {
  command: 'marketplace remove',
  description: 'Remove a marketplace and delete its installed files',
  whenToUse: 'To drop a marketplace you no longer need, by name or by the source it was added from',
  examples: [
    'nova marketplace remove bundles',
    'nova marketplace remove acme/bundles',
    'nova marketplace remove bundles --scope project',
  ],
  expectedOutput:
    'Confirms removal and prints any warnings (missing state, shadowed entries). Exit 1 if the marketplace is not configured or files cannot be deleted.',
  positionals: [
    { name: 'name-or-source', type: 'string', required: true, description: 'Marketplace name, or the source it was added from' },
  ],
  options: [scopeOption('the scope that declares it'), workingDirOption],
  outputSchema: {
    name: 'string',
    scope: 'global | project | user',
    source: 'object',
    installPath: 'string | null',
    warnings: ['string'],
  },
};

export const marketplaceListMeta: AgentCommandMeta = {
  command: 'marketplace list',
  description: 'List configured marketplaces across all scopes',
  whenToUse: 'To see which marketplaces are configured, where they come from, and whether they are installed',
  examples: ['nova marketplace list', 'nova marketplace list --json'],
  expectedOutput: 'Shows each marketplace with scope, source, bundle count and install status, sorted by name.',
  options: [workingDirOption],
  outputSchema: {
    marketplaces: [detailsSchema],
  },
};

export const marketplaceShowMeta: AgentCommandMeta = {
  command: 'marketplace show',
  description: 'Show details for one marketplace',
  whenToUse: 'To inspect a single marketplace: its source, install path, fetch time and bundle count',
  examples: ['nova marketplace show bundles'],
  expectedOutput: 'Prints the marketplace details. Exit 1 if no marketplace has that name.',
  positionals: [{ name: 'name', type: 'string', required: true, description: 'Marketplace name' }],
  options: [workingDirOption],
  outputSchema: {
    marketplace: detailsSchema,
  },
};

export const marketplacePruneMeta: AgentCommandMeta = {
  command: 'marketplace prune',
  description: 'Delete installed files and state for marketplaces no scope configures',
  whenToUse: 'To clean up after interrupted installs or hand-edited config files',
  examples: ['nova marketplace prune'],
  expectedOutput: 'Lists removed state records and directories, or reports that nothing was orphaned.',
  options: [workingDirOption],
  outputSchema: {
    removedState: ['string'],
    removedDirectories: ['string'],
  },
};
