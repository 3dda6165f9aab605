/**
 * Embedding configuration constants
 *
 * Centralizes the fixed values the model catalog, configuration store and
 * wiki cache agree on.
 */

/**
 * Vector width the similarity index is built around. A model with any other
 * width cannot be used against previously indexed content.
 */
export const BASELINE_DIMENSIONS = 768;

/**
 * Embedding Configuration Files
 */
export const EMBEDDER_CONFIG_FILES = {
  /** Active configuration, inside the config directory */
  CONFIG_FILENAME: 'embedder.json',

  /** Single retained prior copy, sibling of the active file */
  BACKUP_FILENAME: 'embedder.json.bak',

  /** Scratch file used to replace the active file by rename */
  TEMP_FILENAME: 'embedder.json.tmp'
} as const;

/**
 * Wiki Cache Files
 */
export const WIKI_CACHE_FILES = {
  /** Every cache filename starts with this */
  PREFIX: 'deepwiki_cache_',

  /** ...and ends with this */
  SUFFIX: '.json',

  /** Joins repoType, owner, repo and language inside the filename */
  SEPARATOR: '_',

  /** Minimum number of tokens a decodable filename has */
  MIN_TOKENS: 4
} as const;
