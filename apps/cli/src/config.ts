import type { Principal } from '@task-registry/core';

export const DEFAULT_OWNER = 'owner';

export interface SessionConfig {
  readonly owner: Principal;
  /** Caller until the first `use` */
  readonly caller: Principal;
  /** Print every notification as it is published */
  readonly verbose: boolean;
}

export interface ConfigFlags {
  owner?: string;
  as?: string;
  verbose?: boolean;
}

function firstNonBlank(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (value != null && value.trim() !== '') return value.trim();
  }
  return undefined;
}

/**
 * Resolve session settings.
 * Priority: command-line flag > environment variable > default.
 */
export function resolveConfig(flags: ConfigFlags, env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const owner = firstNonBlank(flags.owner, env['TASKREG_OWNER']) ?? DEFAULT_OWNER;
  const caller = firstNonBlank(flags.as, env['TASKREG_CALLER']) ?? owner;
  return { owner, caller, verbose: flags.verbose ?? false };
}
