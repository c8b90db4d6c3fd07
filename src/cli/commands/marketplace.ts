import { command, positional, option, string, optional, oneOf } from 'cmd-ts';
import chalk from 'chalk';
import { createServices, type Services } from '../../core/services.js';
import type { MarketplaceDetails } from '../../core/marketplace.js';
import { CONFIG_SCOPES, type ConfigScope } from '../../models/config.js';
import { isJsonMode, jsonOutput } from '../json-output.js';
import { commandGroup, commandHelp } from '../help.js';
import { describeSource, exitWithError } from '../output.js';
import { workingDirArg } from '../flags.js';
import {
  marketplaceAddMeta,
  marketplaceListMeta,
  marketplacePruneMeta,
  marketplaceRemoveMeta,
  marketplaceShowMeta,
} from '../metadata/marketplace.js';

async function loadServices(commandName: string, workingDir: string | undefined): Promise<Services> {
  const services = await createServices(workingDir !== undefined ? { workingDir } : {});
  if (!services.success) exitWithError(commandName, services.error);
  return services.data;
}

function printDetails(mp: MarketplaceDetails): void {
  const status =
    mp.status === 'installed' ? chalk.green(mp.status) : chalk.yellow(mp.status);
  console.log(`  ${chalk.bold(mp.name)} ${chalk.dim(`(${mp.scope})`)}`);
  if (mp.description) {
    console.log(`    ${mp.description}`);
  }
  console.log(`    Source: ${describeSource(mp.source)}`);
  console.log(`    Bundles: ${mp.bundleCount}`);
  console.log(`    Status: ${status}`);
  if (mp.installPath) {
    console.log(`    Path: ${mp.installPath}`);
  }
  if (mp.fetchedAt) {
    console.log(`    Fetched: ${new Date(mp.fetchedAt).toLocaleString()}`);
  }
}

// =============================================================================
// marketplace add
// =============================================================================

const marketplaceAddCmd = command({
  name: 'add',
  description: commandHelp(marketplaceAddMeta),
  args: {
    source: positional({ type: string, displayName: 'source' }),
    scope: option({
      type: oneOf(CONFIG_SCOPES),
      long: 'scope',
      short: 's',
      description: 'Config scope that records the marketplace (global, project, user)',
      defaultValue: (): ConfigScope => 'global',
      defaultValueIsSerializable: true,
    }),
    workingDir: workingDirArg,
  },
  handler: async ({ source, scope, workingDir }) => {
    const commandName = 'marketplace add';
    const { marketplace } = await loadServices(commandName, workingDir);

    if (!isJsonMode()) {
      console.log(`Adding marketplace: ${source}...`);
    }

    // Ctrl-C before the install commits cancels cleanly; afterwards it is ignored
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.on('SIGINT', onInterrupt);

    let result: Awaited<ReturnType<typeof marketplace.add>>;
    try {
      result = await marketplace.add(source, {
        scope,
        signal: controller.signal,
        ...(workingDir !== undefined && { workingDir }),
      });
    } finally {
      process.off('SIGINT', onInterrupt);
    }

    if (!result.success) exitWithError(commandName, result.error);
    const info = result.data;

    if (isJsonMode()) {
      jsonOutput({ success: true, command: commandName, data: { marketplace: info, scope } });
      return;
    }

    console.log(`${chalk.green('✓')} Marketplace '${info.name}' added to ${scope} config`);
    if (info.description) {
      console.log(`  ${info.description}`);
    }
    console.log(`  Bundles: ${info.bundleCount}`);
  },
});

// =============================================================================
// marketplace remove
// =============================================================================

const marketplaceRemoveCmd = command({
  name: 'remove',
  description: commandHelp(marketplaceRemoveMeta),
  args: {
    target: positional({ type: string, displayName: 'name-or-source' }),
    scope: option({
      type: optional(oneOf(CONFIG_SCOPES)),
      long: 'scope',
      short: 's',
      description: 'Only remove an entry declared in this scope',
    }),
    workingDir: workingDirArg,
  },
  handler: async ({ target, scope, workingDir }) => {
    const commandName = 'marketplace remove';
    const { marketplace } = await loadServices(commandName, workingDir);

    const result = await marketplace.remove(target, {
      ...(scope !== undefined && { scope }),
      ...(workingDir !== undefined && { workingDir }),
    });
    if (!result.success) exitWithError(commandName, result.error);
    const removed = result.data;

    if (isJsonMode()) {
      jsonOutput({ success: true, command: commandName, data: removed });
      return;
    }

    console.log(`${chalk.green('✓')} Marketplace '${removed.name}' removed from ${removed.scope} config`);
    if (removed.installPath) {
      console.log(`  Deleted: ${removed.installPath}`);
    }
  },
});

// =============================================================================
// marketplace list
// =============================================================================

const marketplaceListCmd = command({
  name: 'list',
  description: commandHelp(marketplaceListMeta),
  args: {
    workingDir: workingDirArg,
  },
  handler: async ({ workingDir }) => {
    const commandName = 'marketplace list';
    const { marketplace } = await loadServices(commandName, workingDir);

    const result = await marketplace.list();
    if (!result.success) exitWithError(commandName, result.error);
    const marketplaces = result.data;

    if (isJsonMode()) {
      jsonOutput({ success: true, command: commandName, data: { marketplaces } });
      return;
    }

    if (marketplaces.length === 0) {
      console.log('No marketplaces configured.\n');
      console.log('Add a marketplace with:');
      console.log('  nova marketplace add <source>\n');
      console.log('Examples:');
      console.log('  nova marketplace add owner/repo');
      console.log('  nova marketplace add ./path/to/marketplace --scope project');
      return;
    }

    console.log('Configured marketplaces:\n');
    for (const mp of marketplaces) {
      printDetails(mp);
      console.log();
    }
    console.log(`Total: ${marketplaces.length} marketplace(s)`);
  },
});

// =============================================================================
// marketplace show
// =============================================================================

const marketplaceShowCmd = command({
  name: 'show',
  description: commandHelp(marketplaceShowMeta),
  args: {
    name: positional({ type: string, displayName: 'name' }),
    workingDir: workingDirArg,
  },
  handler: async ({ name, workingDir }) => {
    const commandName = 'marketplace show';
    const { marketplace } = await loadServices(commandName, workingDir);

    const result = await marketplace.get(name);
    if (!result.success) exitWithError(commandName, result.error);

    if (isJsonMode()) {
      jsonOutput({ success: true, command: commandName, data: { marketplace: result.data } });
      return;
    }

    printDetails(result.data);
  },
});

// =============================================================================
// marketplace prune
// =============================================================================

const marketplacePruneCmd = command({
  name: 'prune',
  description: commandHelp(marketplacePruneMeta),
  args: {
    workingDir: workingDirArg,
  },
  handler: async ({ workingDir }) => {
    const commandName = 'marketplace prune';
    const { marketplace } = await loadServices(commandName, workingDir);

    const result = await marketplace.prune();
    if (!result.success) exitWithError(commandName, result.error);
    const { removedState, removedDirectories } = result.data;

    if (isJsonMode()) {
      jsonOutput({ success: true, command: commandName, data: result.data });
      return;
    }

    if (removedState.length === 0 && removedDirectories.length === 0) {
      console.log('Nothing to prune.');
      return;
    }
    for (const name of removedState) {
      console.log(`  - state: ${name}`);
    }
    for (const path of removedDirectories) {
      console.log(`  - directory: ${path}`);
    }
    console.log(`\nPruned ${removedState.length} state record(s), ${removedDirectories.length} director(ies)`);
  },
});

export const marketplaceCmd = commandGroup('nova marketplace', {
  name: 'marketplace',
  description: 'Add, remove and inspect bundle marketplaces',
  cmds: {
    add: marketplaceAddCmd,
    remove: marketplaceRemoveCmd,
    list: marketplaceListCmd,
    show: marketplaceShowCmd,
    prune: marketplacePruneCmd,
  },
});
