import dotenv from 'dotenv';
import { homedir } from 'os';
import { delimiter, join } from 'path';
import { DEFAULT_GOPATH_DIR } from './utils/constants.js';

// Load environment variables from .env file (if it exists)
dotenv.config();

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  replace: '',
  outputDir: '',
  debug: false,
} as const;

/**
 * Get configuration value from environment variable or default
 */
export function getEnvOrDefault(envKey: string, defaultValue: string): string;
export function getEnvOrDefault(envKey: string, defaultValue: boolean): boolean;
export function getEnvOrDefault(envKey: string, defaultValue: string | boolean): string | boolean {
  const envValue = process.env[envKey];

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  if (typeof defaultValue === 'boolean') {
    return envValue.toLowerCase() === 'true';
  }

  return envValue;
}

/**
 * GOPATH entries; `~/go` when unset
 */
export function parseGopath(value: string | undefined, home: string = homedir()): string[] {
  if (!value) {
    return [join(home, DEFAULT_GOPATH_DIR)];
  }
  return value.split(delimiter).filter((entry) => entry !== '');
}

/**
 * Application configuration loaded from environment variables
 */
export const config = {
  gopath: parseGopath(process.env.GOPATH),
  goroot: process.env.GOROOT || undefined,

  replace: getEnvOrDefault('VANITY_REPLACE', DEFAULT_CONFIG.replace),
  outputDir: getEnvOrDefault('VANITY_OUTPUT_DIR', DEFAULT_CONFIG.outputDir),
  debug: getEnvOrDefault('VANITY_DEBUG', DEFAULT_CONFIG.debug),
};
