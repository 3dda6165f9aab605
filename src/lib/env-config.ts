/**
 * Configuration Management
 *
 * Runtime settings for docwiki-core, read from environment variables
 * (optionally seeded from a .env file) and the language settings file.
 */

import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { Result, ok, err, describeError } from './result-types.js';
import { ConfigError } from './errors/DocWikiErrors.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Languages a wiki may be generated in
 */
export interface LanguageSettings {
	/** Language code → display name */
	supported: Record<string, string>;
	/** Language used when a request names an unsupported one */
	defaultLanguage: string;
}

/**
 * Opaque authorization code check for destructive cache requests
 */
export interface AuthSettings {
	enabled: boolean;
	code: string;
}

/**
 * Fully resolved runtime settings
 */
export interface RuntimeConfig {
	/** Root for everything docwiki stores (default ~/.docwiki) */
	homeDir: string;
	/** Directory holding embedder.json and its backup */
	configDir: string;
	/** Directory holding wiki cache files */
	cacheDir: string;
	/** Directory for JSON Lines logs */
	logDir: string;
	/** Timeout for availability probes such as `ollama list` */
	probeTimeoutMs: number;
	/** Timeout for install directives */
	installTimeoutMs: number;
	languages: LanguageSettings;
	auth: AuthSettings;
}

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
export const DEFAULT_INSTALL_TIMEOUT_MS = 120_000;

/**
 * Bundled language settings file
 */
export const BUNDLED_LANG_CONFIG_PATH = fileURLToPath(new URL('../../config/lang.json', import.meta.url));

const LangFileSchema = z
	.object({
		supported_languages: z.record(z.string(), z.string()),
		default: z.string().min(1),
	})
	.refine((value) => value.default in value.supported_languages, {
		message: 'default language must be one of supported_languages',
	});

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Configuration Manager
 *
 * Loads settings from the environment with validation. Reads are done against
 * an injectable environment map so tests never touch process.env.
 */
export class ConfigurationManager {
	constructor(
		private env: NodeJS.ProcessEnv = process.env,
		private envPath?: string
	) {}

	/**
	 * Load variables from a .env file into process.env
	 *
	 * A missing file is not an error.
	 */
	loadEnv(): Result<void, ConfigError> {
		try {
			loadEnv({ path: this.envPath });
			return ok(undefined);
		} catch (error) {
			return err(new ConfigError(`Failed to load .env file: ${describeError(error)}`));
		}
	}

	/**
	 * Resolve all runtime settings
	 */
	getRuntimeConfig(): Result<RuntimeConfig, ConfigError> {
		const homeDir = resolve(this.getEnvVar('DOCWIKI_HOME') ?? join(homedir(), '.docwiki'));

		const probeTimeout = this.getEnvPositiveInt('DOCWIKI_PROBE_TIMEOUT_MS', DEFAULT_PROBE_TIMEOUT_MS);
		if (probeTimeout.isErr()) {
			return err(probeTimeout.error);
		}

		const installTimeout = this.getEnvPositiveInt('DOCWIKI_INSTALL_TIMEOUT_MS', DEFAULT_INSTALL_TIMEOUT_MS);
		if (installTimeout.isErr()) {
			return err(installTimeout.error);
		}

		const languages = this.loadLanguageSettings(
			this.getEnvVar('DOCWIKI_LANG_CONFIG') ?? BUNDLED_LANG_CONFIG_PATH
		);
		if (languages.isErr()) {
			return err(languages.error);
		}

		const auth: AuthSettings = {
			enabled: this.getEnvBoolean('WIKI_AUTH_MODE'),
			code: this.getEnvVar('WIKI_AUTH_CODE') ?? '',
		};
		if (auth.enabled && auth.code.length === 0) {
			return err(new ConfigError('WIKI_AUTH_MODE is enabled but WIKI_AUTH_CODE is not set'));
		}

		return ok({
			homeDir,
			configDir: resolve(this.getEnvVar('DOCWIKI_CONFIG_DIR') ?? join(homeDir, 'config')),
			cacheDir: resolve(this.getEnvVar('DOCWIKI_CACHE_DIR') ?? join(homeDir, 'wikicache')),
			logDir: resolve(this.getEnvVar('DOCWIKI_LOG_DIR') ?? join(homeDir, 'logs')),
			probeTimeoutMs: probeTimeout.value,
			installTimeoutMs: installTimeout.value,
			languages: languages.value,
			auth,
		});
	}

	/**
	 * Read and validate a language settings file
	 */
	loadLanguageSettings(filePath: string): Result<LanguageSettings, ConfigError> {
		let raw: unknown;
		try {
			raw = JSON.parse(readFileSync(filePath, 'utf-8'));
		} catch (error) {
			return err(new ConfigError(`Failed to read language settings ${filePath}: ${describeError(error)}`));
		}

		const parsed = LangFileSchema.safeParse(raw);
		if (!parsed.success) {
			return err(
				new ConfigError(
					`Invalid language settings ${filePath}: ${parsed.error.issues.map((i) => i.message).join('; ')}`
				)
			);
		}

		return ok({
			supported: parsed.data.supported_languages,
			defaultLanguage: parsed.data.default,
		});
	}

	/**
	 * Environment map the manager reads from, for credential probes
	 */
	getEnvironment(): NodeJS.ProcessEnv {
		return this.env;
	}

	/**
	 * Get environment variable; empty strings count as unset
	 */
	private getEnvVar(key: string): string | undefined {
		const value = this.env[key];
		return value && value.length > 0 ? value : undefined;
	}

	/**
	 * Get environment variable as a positive integer
	 */
	private getEnvPositiveInt(key: string, fallback: number): Result<number, ConfigError> {
		const value = this.getEnvVar(key);
		if (value === undefined) {
			return ok(fallback);
		}

		const num = Number(value);
		if (!Number.isInteger(num) || num <= 0) {
			return err(new ConfigError(`${key} must be a positive integer, got "${value}"`));
		}
		return ok(num);
	}

	/**
	 * Get environment variable as boolean
	 */
	private getEnvBoolean(key: string): boolean {
		const value = this.getEnvVar(key);
		if (!value) return false;
		return value.toLowerCase() === 'true' || value === '1';
	}
}

/**
 * Create a configuration manager instance
 *
 * @param env - Environment map (default: process.env)
 * @param envPath - Optional path to .env file
 */
export function createConfigManager(env?: NodeJS.ProcessEnv, envPath?: string): ConfigurationManager {
	return new ConfigurationManager(env, envPath);
}
