import * as fs from 'fs';
import * as path from 'path';
import type { ZodIssue } from 'zod';
import { ConfigError, describeError } from '../runner/errors';
import { deployerConfigSchema, type DeployerConfig } from './schema';

export const CONFIG_FILE_NAME = 'crd.config.json';

/** `CRD_CONFIG` (relative to `cwd`) wins over the default file name. */
export function resolveConfigPath(cwd: string, env: NodeJS.ProcessEnv = process.env): string {
  const override = env.CRD_CONFIG?.trim();
  return override ? path.resolve(cwd, override) : path.join(cwd, CONFIG_FILE_NAME);
}

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

export function parseConfig(raw: unknown, configPath: string): DeployerConfig {
  const result = deployerConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(configPath, result.error.issues.map(formatIssue));
  }
  return result.data;
}

/**
 * Loads the workspace configuration. A missing default file means defaults; a
 * missing file named explicitly through CRD_CONFIG is an error.
 */
export function loadConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): DeployerConfig {
  const configPath = resolveConfigPath(cwd, env);

  if (!fs.existsSync(configPath)) {
    if (env.CRD_CONFIG?.trim()) {
      throw new ConfigError(configPath, ['file not found']);
    }
    return parseConfig({}, configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(configPath, [`not valid JSON (${describeError(error)})`]);
  }

  return parseConfig(raw, configPath);
}
