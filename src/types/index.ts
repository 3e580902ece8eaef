/**
 * Common types and interfaces for the pipbridge CLI application
 */

// Core application types
export interface PipBridgeDirectories {
  config: string;
  cache: string;
  workspaces: string;
  /** Handed to pip as PIP_CACHE_DIR */
  pipCache: string;
}

export interface SerialConfig {
  baudRate?: number;
  timeoutMs?: number;
}

export interface PipBridgeConfig {
  /** Base Python interpreter used to create the workspace venv */
  python?: string;
  /** pip requirement installed into the workspace (its major keys the workspace cache) */
  installerSpec?: string;
  wheelSpec?: string;

  indexUrl?: string;
  extraIndexUrls?: string[];
  noMpOrg?: boolean;
  upstreamTimeoutMs?: number;

  /** Extra packages served as empty placeholder wheels */
  dummyPackages?: string[];
  /** Upstream indexes never consulted for a given package: { package: [indexUrl] } */
  excludedIndexes?: Record<string, string[]>;

  /** Glob patterns (relative to the package root) never transferred to the target */
  excludePatterns?: string[];
  /** mpy-cross executable per target runtime version, e.g. { "1.22": "mpy-cross-1.22" } */
  compilers?: Record<string, string>;

  serial?: SerialConfig;
}

// Target selection

export interface TargetSelection {
  port?: string;
  mount?: string;
  dir?: string;
}

// Index selection shared by install, list, download and wheel

export interface IndexOptions {
  indexUrl?: string;
  extraIndexUrls?: string[];
  noIndex?: boolean;
  noMpOrg?: boolean;
  findLinks?: string;
}

export interface SelectionOptions {
  specs?: string[];
  requirementFiles?: string[];
  constraintFiles?: string[];
  pre?: boolean;
  noDeps?: boolean;
}

export type UpgradeStrategy = 'eager' | 'only-if-needed';

export interface InstallOptions extends IndexOptions, SelectionOptions {
  upgrade?: boolean;
  upgradeStrategy?: UpgradeStrategy;
  forceReinstall?: boolean;
  compile?: boolean;
  continueOnError?: boolean;
}

export interface UninstallOptions {
  packages?: string[];
  requirementFiles?: string[];
  yes?: boolean;
}

export type ListFormat = 'columns' | 'freeze' | 'json';

export interface ListOptions extends IndexOptions {
  outdated?: boolean;
  uptodate?: boolean;
  notRequired?: boolean;
  pre?: boolean;
  format?: ListFormat;
  excludes?: string[];
}

export interface FreezeOptions {
  excludes?: string[];
}

export interface DownloadOptions extends IndexOptions, SelectionOptions {
  dest?: string;
}

export interface WheelOptions extends IndexOptions, SelectionOptions {
  wheelDir?: string;
}

export type CacheCommand = 'dir' | 'info' | 'list' | 'purge';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class PipBridgeError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipBridgeError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  NO_TARGET_FOUND = 'NO_TARGET_FOUND',
  MALFORMED_METADATA = 'MALFORMED_METADATA',
  UPSTREAM_UNREACHABLE = 'UPSTREAM_UNREACHABLE',
  INSTALLER_FAILURE = 'INSTALLER_FAILURE',
  TARGET_IO_ERROR = 'TARGET_IO_ERROR',
  COMPILATION_FAILURE = 'COMPILATION_FAILURE',
  WORKSPACE_ERROR = 'WORKSPACE_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
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
