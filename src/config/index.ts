/**
 * Configuration management
 */

import { config as loadEnv } from 'dotenv';
import type { CaesarConfig, NewlineMode } from '../types/index.js';
import type { IEnvironment } from '../types/interfaces.js';
import { SystemEnvironment } from '../infra/environment.js';

const NEWLINE_MODES: readonly NewlineMode[] = ['auto', 'always', 'never'];

function parseNewlineMode(raw: string | undefined): NewlineMode {
  const value = raw?.trim().toLowerCase();
  return NEWLINE_MODES.find((mode) => mode === value) ?? 'auto';
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const value = raw.trim().toLowerCase();
  if (value === '0' || value === 'false' || value === 'no' || value === 'off') return false;
  if (value === '1' || value === 'true' || value === 'yes' || value === 'on') return true;
  return fallback;
}

export class ConfigManager {
  private env: IEnvironment;
  private loadDotenv: boolean;
  private _config?: CaesarConfig;
  private envLoaded = false;

  constructor(env?: IEnvironment, options: { loadDotenv?: boolean } = {}) {
    this.env = env || new SystemEnvironment();
    this.loadDotenv = options.loadDotenv ?? env === undefined;
  }

  get config(): CaesarConfig {
    if (!this._config) {
      // Lazy load .env only once, and only for the real process environment
      if (this.loadDotenv && !this.envLoaded) {
        loadEnv({ quiet: true });
        this.envLoaded = true;
      }

      this._config = {
        newline: parseNewlineMode(this.env.get('CAESAR_NEWLINE')),
        color: parseFlag(this.env.get('CAESAR_COLOR'), true),
      };
    }
    return this._config;
  }

  resetConfig(): void {
    this._config = undefined;
    this.envLoaded = false;
  }
}

const defaultConfigManager = new ConfigManager();

export function getConfig(): CaesarConfig {
  return defaultConfigManager.config;
}
