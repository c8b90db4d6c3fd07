#!/usr/bin/env node

import { run } from 'cmd-ts';
import chalk from 'chalk';
import { commandGroup } from './help.js';
import { marketplaceCmd } from './commands/marketplace.js';
import { configCmd } from './commands/config.js';
import { extractJsonFlag, setJsonMode } from './json-output.js';
import { extractAgentHelpFlag, printAgentHelp, APP_DESCRIPTION } from './agent-help.js';
import { extractFlag } from './flags.js';
import { exitWithError } from './output.js';
import { findPackageJson } from './package-json.js';

const packageJson = findPackageJson(import.meta.url);

const app = commandGroup('nova', {
  name: 'nova',
  description:
    `${APP_DESCRIPTION}\n\n` +
    'Global flags: --json for structured output, --no-color, --agent-help for machine-readable help',
  version: packageJson.version,
  cmds: {
    marketplace: marketplaceCmd,
    config: configCmd,
  },
});

const rawArgs = process.argv.slice(2);
const { args: argsNoJson, json } = extractJsonFlag(rawArgs);
const { args: argsNoColor, present: noColor } = extractFlag(argsNoJson, '--no-color');
const { args: finalArgs, agentHelp } = extractAgentHelpFlag(argsNoColor);
setJsonMode(json);

if (noColor || process.env.NO_COLOR) {
  chalk.level = 0;
}

if (agentHelp) {
  printAgentHelp(finalArgs, packageJson.version);
}

try {
  await run(app, finalArgs);
} catch (error) {
  exitWithError('nova', error instanceof Error ? error : new Error(String(error)));
}
