import dotenv from 'dotenv';
import { SUPPORTED_LOCALES, type Locale } from './modules/ratios/types.js';
import { isLogLevel, type RatioLogLevel } from './modules/ratios/utils.js';

export interface AppConfig {
  locale: Locale;
  registryPath?: string;
  logLevel: RatioLogLevel;
}

export function toLocale(value: string): Locale | undefined {
  const normalized = value.trim().toLowerCase();
  return SUPPORTED_LOCALES.find((locale) => locale === normalized);
}

export function parseLocale(value: string | undefined, fallback: Locale = 'en'): Locale {
  return value === undefined ? fallback : toLocale(value) ?? fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  const registryPath = env.METRICS_REGISTRY_PATH?.trim() || undefined;

  return {
    locale: parseLocale(env.REPORT_LOCALE),
    ...(registryPath ? { registryPath } : {}),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info'
  };
}

/** Reads `.env` into `process.env` (existing variables win) and returns the resulting config. */
export function initConfig(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
