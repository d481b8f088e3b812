import { join, resolve } from 'path';
import * as yaml from 'js-yaml';

import type { AuditConfig, MalformedLinePolicy } from '../types/index.js';
import { CONFIG_FILE_NAMES, DEFAULT_ROOT } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration for the metalog-audit CLI.
 * Values come from defaults, then an optional YAML file, then CLI flags.
 */

export const DEFAULT_CONFIG: AuditConfig = {
  inodeReport: false,
  root: DEFAULT_ROOT,
  malformedLines: 'abort'
};

const KNOWN_KEYS = new Set<string>(['inodeReport', 'root', 'malformedLines']);

export interface LoadConfigOptions {
  cwd?: string;
  /** explicit config file; must exist */
  configPath?: string;
}

async function findConfigFile(cwd: string): Promise<string | null> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const path = join(cwd, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

function isPolicy(value: unknown): value is MalformedLinePolicy {
  return value === 'abort' || value === 'skip';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed YAML into a partial config.
 */
export function sanitizeConfig(data: unknown, source: string): Partial<AuditConfig> {
  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }

  const config: Partial<AuditConfig> = {};

  if (data.inodeReport !== undefined) {
    if (typeof data.inodeReport !== 'boolean') {
      throw new ConfigError(`${source}: inodeReport must be true or false`);
    }
    config.inodeReport = data.inodeReport;
  }

  if (data.root !== undefined) {
    if (typeof data.root !== 'string' || data.root.trim().length === 0) {
      throw new ConfigError(`${source}: root must be a non-empty path`);
    }
    config.root = data.root;
  }

  if (data.malformedLines !== undefined) {
    if (!isPolicy(data.malformedLines)) {
      throw new ConfigError(`${source}: malformedLines must be "abort" or "skip"`);
    }
    config.malformedLines = data.malformedLines;
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.debug(`Ignoring unknown config key "${key}" in ${source}`);
    }
  }

  return config;
}

export async function loadAuditConfig(options: LoadConfigOptions = {}): Promise<AuditConfig> {
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null;
  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!(await exists(configPath))) {
      throw new ConfigError(`config file not found: ${configPath}`);
    }
  } else {
    configPath = await findConfigFile(cwd);
  }

  if (!configPath) {
    logger.debug('Config file not found, using defaults');
    return { ...DEFAULT_CONFIG };
  }

  logger.debug(`Loading config from: ${configPath}`);
  const content = await readTextFile(configPath);

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${configPath}: invalid YAML: ${reason}`);
  }

  return { ...DEFAULT_CONFIG, ...sanitizeConfig(data, configPath) };
}
