/**
 * Shared constants for the metalog-audit CLI.
 * Report wording lives here so the renderers and tests agree on it.
 */

export const CONFIG_FILE_NAMES = ['.metalog-audit.yml', '.metalog-audit.yaml'] as const;

export const ENV_VARS = {
  VERBOSE: 'METALOG_AUDIT_VERBOSE'
} as const;

export const ATTRIBUTE_KEYS = {
  MODE: 'mode',
  SIZE: 'size',
  TYPE: 'type',
  TAGS: 'tags'
} as const;

export const ENTRY_TYPES = {
  FILE: 'file',
  DIR: 'dir',
  LINK: 'link'
} as const;

/** Entry types left out of hard-link comparison */
export const INODE_EXEMPT_TYPES: readonly string[] = [ENTRY_TYPES.LINK, ENTRY_TYPES.DIR];

export const MODE_BITS = {
  SETUID: 0o4000,
  SETGID: 0o2000
} as const;

export const PACKAGE_TAG_PREFIX = 'package=';

/** Pseudo attribute reported when records differ by filename */
export const FILENAME_CONFLICT_KEY = 'filename';

export const REPORT_TEXT = {
  PACKAGE_HEADER: '--- PACKAGE REPORTS ---',
  UNKNOWN: '?',
  DUPLICATE_WARNING: 'exists in multiple locations',
  DUPLICATE_ERROR: 'exists in multiple locations and with different meta',
  INODE_ERROR: 'entries point to the same inode but have different meta'
} as const;

export const DEFAULT_ROOT = '/';
