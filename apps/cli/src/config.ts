import { DEFAULT_SECTION_TITLE } from '@sortbox/core';

export interface CliConfig {
  /** Title of the default section */
  inboxTitle: string;
  /** Log every store change notification */
  verbose: boolean;
}

export interface CliFlags {
  inboxTitle?: string;
  verbose?: boolean;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

/** Resolve settings. Priority: flag > environment > default. */
export function resolveConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const envTitle = env['SORTBOX_INBOX_TITLE']?.trim();
  return {
    inboxTitle: flags.inboxTitle?.trim() || envTitle || DEFAULT_SECTION_TITLE,
    verbose: flags.verbose ?? TRUTHY.has((env['SORTBOX_VERBOSE'] ?? '').trim().toLowerCase()),
  };
}
