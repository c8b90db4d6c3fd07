import { extractFlag } from './flags.js';

let jsonMode = false;

export function isJsonMode(): boolean {
  return jsonMode;
}

export function setJsonMode(value: boolean): void {
  jsonMode = value;
}

/**
 * Shape of every `--json` response on stdout
 */
export interface JsonEnvelope {
  success: boolean;
  command: string;
  data?: unknown;
  error?: string;
  /** Stable error code, e.g. MARKETPLACE_EXISTS */
  code?: string;
  hint?: string;
}

export function jsonOutput(envelope: JsonEnvelope): void {
  console.log(JSON.stringify(envelope, null, 2));
}

/**
 * Strip --json from args so cmd-ts doesn't see it.
 */
export function extractJsonFlag(args: string[]): { args: string[]; json: boolean } {
  const { args: rest, present } = extractFlag(args, '--json');
  return { args: rest, json: present };
}
