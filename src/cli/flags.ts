import { option, optional, string } from 'cmd-ts';

/**
 * `--working-dir` shared by every command
 */
export const workingDirArg = option({
  type: optional(string),
  long: 'working-dir',
  short: 'C',
  description: 'Directory to resolve the project and relative paths from (default: cwd)',
});

/**
 * Strip every occurrence of a global boolean flag (e.g. --json) from argv
 * before cmd-ts parses it, so the flag works in any position.
 */
export function extractFlag(args: string[], flag: string): { args: string[]; present: boolean } {
  const rest = args.filter((arg) => arg !== flag);
  return { args: rest, present: rest.length !== args.length };
}
