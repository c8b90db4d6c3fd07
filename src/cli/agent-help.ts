import type { AgentCommandMeta } from './help.js';
import { extractFlag } from './flags.js';
import { configShowMeta } from './metadata/config.js';
import {
  marketplaceAddMeta,
  marketplaceListMeta,
  marketplacePruneMeta,
  marketplaceRemoveMeta,
  marketplaceShowMeta,
} from './metadata/marketplace.js';

export const APP_DESCRIPTION =
  'Layered configuration and marketplace management for nova';

export const allCommands: AgentCommandMeta[] = [
  marketplaceAddMeta,
  marketplaceRemoveMeta,
  marketplaceListMeta,
  marketplaceShowMeta,
  marketplacePruneMeta,
  configShowMeta,
];

/**
 * Strip --agent-help from args so cmd-ts doesn't see it.
 */
export function extractAgentHelpFlag(args: string[]): { args: string[]; agentHelp: boolean } {
  const { args: rest, present } = extractFlag(args, '--agent-help');
  return { args: rest, agentHelp: present };
}

function formatForAgent(meta: AgentCommandMeta): Record<string, unknown> {
  return {
    command: meta.command,
    description: meta.description,
    when_to_use: meta.whenToUse,
    ...(meta.positionals && meta.positionals.length > 0 && { positionals: meta.positionals }),
    ...(meta.options && meta.options.length > 0 && { options: meta.options }),
    examples: meta.examples,
    ...(meta.outputSchema && { output_schema: meta.outputSchema }),
  };
}

/**
 * Machine-readable help for a command path: the full tree for an empty path,
 * one command for an exact match, or a group for a prefix ("marketplace").
 * @returns null when nothing matches
 */
export function agentHelpFor(args: string[], version: string): Record<string, unknown> | null {
  const commandPath = args.filter((a) => !a.startsWith('-')).join(' ');

  if (!commandPath) {
    return {
      name: 'nova',
      version,
      description: APP_DESCRIPTION,
      commands: allCommands.map(formatForAgent),
    };
  }

  const match = allCommands.find((c) => c.command === commandPath);
  if (match) {
    return formatForAgent(match);
  }

  const group = allCommands.filter((c) => c.command.startsWith(`${commandPath} `));
  if (group.length > 0) {
    return { name: commandPath, commands: group.map(formatForAgent) };
  }

  return null;
}

export function printAgentHelp(args: string[], version: string): never {
  const help = agentHelpFor(args, version);
  if (help === null) {
    console.error(`Unknown command: ${args.join(' ')}`);
    process.exit(1);
  }
  console.log(JSON.stringify(help, null, 2));
  process.exit(0);
}
