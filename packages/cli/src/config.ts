/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import { isEnvironment, isLogLevel, type Environment, type LogLevel } from '@lumen/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface LumenConfig {
  logLevel?: LogLevel;
  environment?: Environment;
}

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      try {
        if (fs.statSync(envPath).isFile()) {
          return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
        }
      } catch {
        // Ignore read errors, continue searching
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

function applyVariables(config: LumenConfig, vars: Record<string, string | undefined>): void {
  const level = vars.LUMEN_LOG_LEVEL;
  if (level && isLogLevel(level)) {
    config.logLevel = level;
  }

  const environment = vars.LUMEN_ENV;
  if (environment && isEnvironment(environment)) {
    config.environment = environment;
  }
}

/**
 * Load lumen configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * Unrecognized values are ignored.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: Record<string, string | undefined> = process.env,
): LumenConfig {
  const config: LumenConfig = {};

  const envFile = findEnvFile(cwd);
  if (envFile) {
    applyVariables(config, envFile);
  }

  applyVariables(config, env);

  return config;
}
