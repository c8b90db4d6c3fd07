import { command, option, optional, oneOf } from 'cmd-ts';
import { dump } from 'js-yaml';
import { FileConfigStore } from '../../core/config-store.js';
import { CONFIG_SCOPES, type ConfigScope } from '../../models/config.js';
import { isJsonMode, jsonOutput } from '../json-output.js';
import { commandGroup, commandHelp } from '../help.js';
import { exitWithError } from '../output.js';
import { configShowMeta } from '../metadata/config.js';
import { workingDirArg } from '../flags.js';

const CONFIG_FORMATS = ['yaml', 'json'] as const;

export type ConfigFormat = (typeof CONFIG_FORMATS)[number];

/**
 * Render a config document for the terminal.
 */
export function renderConfig(config: unknown, format: ConfigFormat): string {
  return format === 'json' ? `${JSON.stringify(config, null, 2)}\n` : dump(config, { lineWidth: -1 });
}

// =============================================================================
// config show
// =============================================================================

const configShowCmd = command({
  name: 'show',
  description: commandHelp(configShowMeta),
  args: {
    scope: option({
      type: optional(oneOf(CONFIG_SCOPES)),
      long: 'scope',
      short: 's',
      description: 'Show only this scope file, without merging or environment overrides',
    }),
    format: option({
      type: oneOf(CONFIG_FORMATS),
      long: 'format',
      short: 'f',
      description: 'Output format (yaml, json)',
      defaultValue: (): ConfigFormat => 'yaml',
      defaultValueIsSerializable: true,
    }),
    workingDir: workingDirArg,
  },
  handler: async ({ scope, format, workingDir }) => {
    const commandName = 'config show';
    const store = new FileConfigStore(workingDir !== undefined ? { workingDir } : {});

    const result = scope !== undefined ? await store.load(scope) : await store.resolve();
    if (!result.success) exitWithError(commandName, result.error);

    const shownScope: ConfigScope | null = scope ?? null;

    if (isJsonMode()) {
      jsonOutput({
        success: true,
        command: commandName,
        data: {
          scope: shownScope,
          path: shownScope !== null ? store.getScopePath(shownScope) : null,
          config: result.data,
        },
      });
      return;
    }

    process.stdout.write(renderConfig(result.data, format));
  },
});

export const configCmd = commandGroup('nova config', {
  name: 'config',
  description: 'Inspect layered configuration',
  cmds: {
    show: configShowCmd,
  },
});
