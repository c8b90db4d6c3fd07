import { subcommands } from 'cmd-ts';

/**
 * Structured command metadata. Drives both the enriched `--help` text and
 * the machine-readable `--agent-help` output.
 */
export interface CommandMeta {
  description: string;
  whenToUse: string;
  examples: string[];
  expectedOutput: string;
}

export interface CommandOption {
  flag: string;
  short?: string;
  type: 'boolean' | 'string';
  description: string;
  required?: boolean;
  choices?: string[];
}

export interface CommandPositional {
  name: string;
  type: 'string';
  required: boolean;
  description?: string;
}

export interface AgentCommandMeta extends CommandMeta {
  /** Command path without the binary name, e.g. "marketplace add" */
  command: string;
  positionals?: CommandPositional[];
  options?: CommandOption[];
  outputSchema?: Record<string, unknown>;
}

/**
 * Long description for a cmd-ts command. cmd-ts prints string options
 * without their accepted values, so options with `choices` get their own
 * paragraph after the examples.
 */
export function commandHelp(meta: AgentCommandMeta): string {
  const paragraphs = [
    meta.description,
    `When to use: ${meta.whenToUse}`,
    ['Examples:', ...meta.examples.map((example) => `  $ ${example}`)].join('\n'),
  ];

  const restricted = (meta.options ?? []).filter((option) => option.choices !== undefined);
  if (restricted.length > 0) {
    paragraphs.push(
      ['Accepted values:', ...restricted.map((option) => `  ${option.flag}: ${(option.choices ?? []).join(', ')}`)].join(
        '\n',
      ),
    );
  }

  paragraphs.push(`Output: ${meta.expectedOutput}`);
  return paragraphs.join('\n\n');
}

type GroupConfig = Parameters<typeof subcommands>[0];

export function summaryLine(description: string | undefined): string {
  return description?.split('\n', 1)[0] ?? '';
}

/**
 * Help page for a command group: usage, the group description, then one
 * aligned line per child holding the first line of its description.
 * @param path - Full invocation, e.g. "nova marketplace"
 */
export function renderGroupHelp(path: string, config: GroupConfig): string {
  const children = Object.entries(config.cmds);
  const width = Math.max(0, ...children.map(([name]) => name.length));

  const lines = [`Usage: ${path} <command> [options]`];
  if (config.description) {
    lines.push('', config.description);
  }
  lines.push('', 'Commands:');
  for (const [name, cmd] of children) {
    lines.push(`  ${name.padEnd(width)}  ${summaryLine(cmd.description)}`.trimEnd());
  }
  lines.push('', `Run '${path} <command> --help' for details on a command.`);
  return lines.join('\n');
}

/**
 * `subcommands` with nova's group help page. A child's own --help still
 * prints its full description.
 */
export function commandGroup(path: string, config: GroupConfig): ReturnType<typeof subcommands> {
  const group = subcommands(config);
  group.printHelp = () => renderGroupHelp(path, config);
  return group;
}
