/**
 * Configuration Manager
 * Application settings from the environment and provider account lists from JSON files
 */
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { logger, setLogLevel } from '../core/Logger.js';
import { ConfigurationError } from '../core/errors.js';
import { defaultDataDir } from '../storage/StorageContainer.js';
import { appConfigSchema, providerConfigFileSchema, type AppConfig, type ProviderConfigEntry } from './schema.js';

type Env = Record<string, string | undefined>;

/**
 * Read environment variable as boolean
 */
function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

export class ConfigManager {
  private _app: AppConfig;

  constructor(env: Env = process.env) {
    const parsed = appConfigSchema.safeParse({
      logLevel: env['LOG_LEVEL']?.toLowerCase(),
      logPretty: getEnvBool(env, 'LOG_PRETTY', true),
      dataDir: resolve(env['DATA_DIR'] ?? defaultDataDir(homedir())),
      configDir: resolve(env['CONFIG_DIR'] ?? 'configs'),
      updateInterval: env['UPDATE_INTERVAL'],
      ipCacheMaxAge: env['IP_CACHE_MAX_AGE'],
      httpTimeout: env['HTTP_TIMEOUT'],
      contactEmail: env['CONTACT_EMAIL'] || undefined,
      runOnce: getEnvBool(env, 'RUN_ONCE', false),
    });

    if (!parsed.success) {
      throw ConfigurationError.invalid('environment', parsed.error);
    }

    this._app = parsed.data;
    setLogLevel(this._app.logLevel);

    logger.debug(
      {
        dataDir: this._app.dataDir,
        configDir: this._app.configDir,
        updateInterval: this._app.updateInterval,
      },
      'Configuration loaded'
    );
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  /**
   * Path of a provider's account list, e.g. `<configDir>/noip.com/config.json`
   */
  providerConfigPath(provider: string): string {
    return join(this._app.configDir, provider, 'config.json');
  }

  /**
   * Load and validate a provider's account list. Throws ConfigurationError.
   */
  loadProviderConfig(provider: string): ProviderConfigEntry[] {
    return loadProviderConfigFile(this.providerConfigPath(provider));
  }
}

export function loadProviderConfigFile(filename: string): ProviderConfigEntry[] {
  if (!existsSync(filename)) {
    throw ConfigurationError.missingFile(filename);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filename, 'utf-8'));
  } catch (error) {
    throw ConfigurationError.unreadable(filename, error);
  }

  const parsed = providerConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw ConfigurationError.invalid(`file '${filename}'`, parsed.error);
  }

  logger.info({ filename, entries: parsed.data.length }, 'Provider configuration loaded');
  return parsed.data;
}
