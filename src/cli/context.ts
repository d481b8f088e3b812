/**
 * CLI Context Factory
 *
 * Resolves the effective audit configuration for a command: defaults, then the
 * YAML config file, then command-line flags. Command handlers should use this
 * instead of calling loadAuditConfig() directly so flag precedence stays in
 * one place.
 */

import type { AuditConfig } from '../types/index.js';
import { LogLevel } from '../types/index.js';
import { loadAuditConfig } from '../core/config.js';
import { logger } from '../utils/logger.js';

export interface AuditFlags {
  config?: string;
  root?: string;
  inodes?: boolean;
  skipMalformed?: boolean;
  verbose?: boolean;
}

export async function createAuditContext(flags: AuditFlags, cwd: string = process.cwd()): Promise<AuditConfig> {
  if (flags.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const config = await loadAuditConfig({ cwd, configPath: flags.config });

  const resolved: AuditConfig = {
    inodeReport: flags.inodes ?? config.inodeReport,
    root: flags.root ?? config.root,
    malformedLines: flags.skipMalformed ? 'skip' : config.malformedLines
  };
  logger.debug('Resolved audit config', resolved);
  return resolved;
}
