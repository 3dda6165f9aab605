/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * The caller may succeed by trying again later (tool missing, disk busy)
   */
  TRANSIENT = 'transient',

  /**
   * Retrying the same request will fail the same way
   */
  PERMANENT = 'permanent'
}

/**
 * Base class for every typed failure returned by docwiki-core
 */
export abstract class DocWikiError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;

  constructor(message: string, code: string, category: ErrorCategory, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Model id is not in the catalog
 */
export class ModelUnknownError extends DocWikiError {
  public readonly modelId: string;

  constructor(modelId: string, knownIds: string[]) {
    super(
      `Unknown embedding model "${modelId}". Known models: ${knownIds.join(', ')}`,
      'MODEL_UNKNOWN',
      ErrorCategory.PERMANENT
    );
    this.modelId = modelId;
  }
}

/**
 * Target model's vector width differs from the baseline and the switch was not forced
 */
export class IncompatibleDimensionError extends DocWikiError {
  public readonly modelId: string;
  public readonly dimensions: number;
  public readonly baseline: number;
  public readonly compatibleAlternatives: string[];

  constructor(modelId: string, dimensions: number, baseline: number, compatibleAlternatives: string[]) {
    super(
      `Model "${modelId}" produces ${dimensions}-dimensional vectors but the index is built for ${baseline}. ` +
        `Use --force to switch anyway, or choose a compatible model (${baseline}D): ${compatibleAlternatives.join(', ')}`,
      'INCOMPATIBLE_DIMENSION',
      ErrorCategory.PERMANENT
    );
    this.modelId = modelId;
    this.dimensions = dimensions;
    this.baseline = baseline;
    this.compatibleAlternatives = compatibleAlternatives;
  }
}

/**
 * Model prerequisite is missing and there is nothing to install
 */
export class NotAvailableError extends DocWikiError {
  public readonly modelId: string;

  constructor(modelId: string, hint: string) {
    super(`Model "${modelId}" is not available: ${hint}`, 'NOT_AVAILABLE', ErrorCategory.TRANSIENT, true);
    this.modelId = modelId;
  }
}

/**
 * Install directive exited non-zero, timed out, or could not be spawned
 */
export class InstallationFailedError extends DocWikiError {
  public readonly modelId: string;
  public readonly directive: string;
  public readonly stderr: string;

  constructor(modelId: string, directive: string, reason: string, stderr: string = '') {
    super(
      `Failed to install "${modelId}" using "${directive}": ${reason}`,
      'INSTALLATION_FAILED',
      ErrorCategory.TRANSIENT,
      true
    );
    this.modelId = modelId;
    this.directive = directive;
    this.stderr = stderr;
  }
}

/**
 * Embedding configuration file exists but cannot be read or parsed
 */
export class ConfigReadFailedError extends DocWikiError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Failed to read embedding configuration ${path}: ${reason}`, 'CONFIG_READ_FAILED', ErrorCategory.PERMANENT);
    this.path = path;
  }
}

/**
 * Backup or primary write of the embedding configuration failed
 */
export class ConfigWriteFailedError extends DocWikiError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(
      `Failed to write embedding configuration ${path}: ${reason}`,
      'CONFIG_WRITE_FAILED',
      ErrorCategory.TRANSIENT,
      true
    );
    this.path = path;
  }
}

/**
 * No usable wiki cache file for the key
 */
export class CacheEntryNotFoundError extends DocWikiError {
  public readonly path: string;

  constructor(path: string) {
    super(`Wiki cache not found: ${path}`, 'CACHE_ENTRY_NOT_FOUND', ErrorCategory.PERMANENT);
    this.path = path;
  }
}

/**
 * Writing or removing a wiki cache file failed
 */
export class CacheWriteFailedError extends DocWikiError {
  public readonly path: string;
  public readonly operation: 'write' | 'delete';

  constructor(path: string, operation: 'write' | 'delete', reason: string) {
    super(`Failed to ${operation} wiki cache ${path}: ${reason}`, 'CACHE_WRITE_FAILED', ErrorCategory.TRANSIENT, true);
    this.path = path;
    this.operation = operation;
  }
}

/**
 * Cache filename could not be decoded into a key; logged and left out of listings
 */
export class CacheParseSkippedError extends DocWikiError {
  public readonly filename: string;

  constructor(filename: string, reason: string) {
    super(`Skipped wiki cache file ${filename}: ${reason}`, 'CACHE_PARSE_SKIPPED', ErrorCategory.PERMANENT);
    this.filename = filename;
  }
}

/**
 * Key component would escape the cache directory or is empty
 */
export class InvalidCacheKeyError extends DocWikiError {
  public readonly field: string;

  constructor(field: string, value: string, reason: string) {
    super(`Invalid wiki cache key ${field} "${value}": ${reason}`, 'INVALID_CACHE_KEY', ErrorCategory.PERMANENT);
    this.field = field;
  }
}

/**
 * Language is not in the configured language list
 */
export class UnsupportedLanguageError extends DocWikiError {
  public readonly language: string;

  constructor(language: string, supported: string[]) {
    super(
      `Language "${language}" is not supported. Supported languages: ${supported.join(', ')}`,
      'UNSUPPORTED_LANGUAGE',
      ErrorCategory.PERMANENT
    );
    this.language = language;
  }
}

/**
 * Authorization code did not match while auth mode is on
 */
export class AuthorizationRejectedError extends DocWikiError {
  constructor() {
    super('Authorization code is invalid', 'AUTHORIZATION_REJECTED', ErrorCategory.PERMANENT);
  }
}

/**
 * Runtime settings (environment, language file) are invalid
 */
export class ConfigError extends DocWikiError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', ErrorCategory.PERMANENT);
  }
}

/**
 * Every error a switch can end with
 */
export type SwitchError =
  | ModelUnknownError
  | IncompatibleDimensionError
  | NotAvailableError
  | InstallationFailedError
  | ConfigWriteFailedError;
