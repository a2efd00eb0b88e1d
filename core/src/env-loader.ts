import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

export interface EnvLoaderOptions {
  /** Directory searched before the current working directory (usually the config file's directory) */
  projectDir?: string;
  verbose?: boolean;
}

export interface EnvLoaderResult {
  loaded: string[];
}

/**
 * Load environment variables from .env files.
 *
 * Searches in the following order (first file found takes priority):
 * 1. The project directory, when given
 * 2. Current working directory (as fallback, never overriding)
 */
export function loadEnv(options: EnvLoaderOptions = {}): EnvLoaderResult {
  const loaded: string[] = [];

  if (options.projectDir) {
    const projectEnvPath = resolve(options.projectDir, '.env');
    if (existsSync(projectEnvPath)) {
      const result = dotenvConfig({ path: projectEnvPath });
      if (result.parsed) {
        loaded.push(projectEnvPath);
        if (options.verbose) {
          console.log(`[env] Loaded: ${projectEnvPath}`);
        }
      }
    }
  }

  const cwdEnvPath = resolve(process.cwd(), '.env');
  if (!loaded.includes(cwdEnvPath) && existsSync(cwdEnvPath)) {
    const result = dotenvConfig({ path: cwdEnvPath, override: false });
    if (result.parsed) {
      loaded.push(cwdEnvPath);
      if (options.verbose) {
        console.log(`[env] Loaded (fallback): ${cwdEnvPath}`);
      }
    }
  }

  return { loaded };
}
