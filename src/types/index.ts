/**
 * Core types and interfaces for the metalog-audit CLI
 */

// Manifest types

/**
 * Attribute map of a single METALOG line.
 * Iteration follows the order keys first appear on the line.
 */
export type MetalogAttributes = ReadonlyMap<string, string>;

export interface MetalogRecord {
  filename: string;
  /** 1-based physical line number in the manifest */
  lineNumber: number;
  attributes: MetalogAttributes;
}

export type MalformedLinePolicy = 'abort' | 'skip';

export interface MalformedLine {
  lineNumber: number;
  line: string;
}

export interface MetalogIndex {
  /** filename -> records in scan order */
  files: Map<string, MetalogRecord[]>;
  /** package name -> filenames tagged with it */
  packages: Map<string, Set<string>>;
  /** lines dropped under the `skip` policy */
  malformed: MalformedLine[];
}

export type EquivalenceResult =
  | { equal: true }
  | { equal: false; conflictKey: string };

/**
 * Identity of a file on disk as `<device>:<inode>`. Inode numbers alone repeat
 * across mounted filesystems.
 */
export type FileIdentity = string;

/**
 * Resolves a manifest filename to its file identity, or null when it cannot be looked up.
 */
export type InodeLookup = (filename: string) => Promise<FileIdentity | null>;

// Report types

export interface PackageSummary {
  name: string;
  /** null when a duplicated file in the package has conflicting metadata */
  fileCount: number | null;
  /** null when the count is unknown or a file size could not be read */
  totalSize: bigint | null;
  setuid: boolean;
  setgid: boolean;
}

export interface DuplicateFinding {
  filename: string;
  lineNumbers: number[];
  /** set when the duplicates disagree */
  conflictKey?: string;
}

export interface InodeFinding {
  filenames: string[];
  lineNumbers: number[];
  conflictKey: string;
}

// Configuration types

export interface AuditConfig {
  inodeReport: boolean;
  /** directory that `./`-relative manifest paths resolve against */
  root: string;
  malformedLines: MalformedLinePolicy;
}

// Status and error types

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class MetalogAuditError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MetalogAuditError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  USAGE_ERROR = 'USAGE_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  MALFORMED_LINE = 'MALFORMED_LINE',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
