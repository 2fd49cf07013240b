/**
 * Shared environment loading utilities for MCP servers
 * Centralizes the common pattern of loading .env files relative to the project root
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Options for loading environment variables
 */
export interface EnvLoaderOptions {
  /** Custom path to .env file (overrides default resolution) */
  envPath?: string;
  /** Whether to throw an error if .env file is not found (default: false) */
  required?: boolean;
  /** Additional environment variables to set (useful for testing) */
  overrides?: Record<string, string>;
}

/**
 * Find the project root by looking for a .env file or the workspace package.json
 */
export function findProjectRoot(startDir: string): string {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    if (fs.existsSync(path.join(currentDir, '.env'))) {
      return currentDir;
    }
    const pkgPath = path.join(currentDir, 'package.json');
    if (fs.existsSync(pkgPath)) {
      try {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
        if (pkg && typeof pkg === 'object' && 'workspaces' in pkg) {
          return currentDir;
        }
      } catch (error) {
        console.error(`[env] Skipping unreadable ${pkgPath}: ${error}`);
      }
    }
    currentDir = path.dirname(currentDir);
  }

  return startDir;
}

/**
 * Load environment variables from the nearest .env file
 *
 * @param startDir - Directory to start searching from, usually the caller's `__dirname`
 * @returns The resolved path to the .env file (or null if not found)
 *
 * @example
 * ```typescript
 * import { loadEnv } from '@issue-delegate/shared';
 *
 * loadEnv(__dirname);
 * ```
 */
export function loadEnv(startDir: string, options: EnvLoaderOptions = {}): string | null {
  const envPath = options.envPath ?? path.resolve(findProjectRoot(startDir), '.env');

  if (!fs.existsSync(envPath)) {
    if (options.required) {
      throw new Error(`Required .env file not found at: ${envPath}`);
    }
    return null;
  }

  dotenv.config({ path: envPath });

  if (options.overrides) {
    for (const [key, value] of Object.entries(options.overrides)) {
      process.env[key] = value;
    }
  }

  return envPath;
}

/**
 * Get required environment variable or throw
 *
 * @param defaultValue - Returned instead of throwing when the variable is unset
 */
export function getEnvOrThrow(name: string, defaultValue?: string): string {
  const value = process.env[name];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value.trim().replace(/\r\n?/g, '');
}

/**
 * Get optional environment variable with default
 */
export function getEnv(name: string, defaultValue: string = ''): string {
  const value = process.env[name];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.trim().replace(/\r\n?/g, '');
}
