import { describe, test, expect } from 'vitest';
import { renderConfig } from '../../../src/cli/commands/config.js';

describe('renderConfig', () => {
  const config = {
    marketplaces: [{ name: 'bundles', source: { type: 'github', owner: 'acme', repo: 'bundles' }, scope: 'global' }],
    git: { depth: 1 },
  };

  test('renders YAML by default format', () => {
    expect(renderConfig(config, 'yaml')).toBe(
      [
        'marketplaces:',
        '  - name: bundles',
        '    source:',
        '      type: github',
        '      owner: acme',
        '      repo: bundles',
        '    scope: global',
        'git:',
        '  depth: 1',
        '',
      ].join('\n'),
    );
  });

  test('renders indented JSON with a trailing newline', () => {
    expect(renderConfig({ git: { depth: 1 } }, 'json')).toBe('{\n  "git": {\n    "depth": 1\n  }\n}\n');
  });

  test('renders an empty document', () => {
    expect(renderConfig({}, 'yaml')).toBe('{}\n');
  });
});
