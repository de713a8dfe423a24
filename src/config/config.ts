import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { RowpagerConfigSchema, type RowpagerConfig } from './schema.js';

export interface ConfigSources {
  /** Directory holding rowpager.json (default: cwd). */
  workspaceDir?: string;
  /** Directory holding .rowpager/config.json (default: $HOME). */
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load config with priority: CLI flags > env vars > workspace json > user json > defaults
 */
export async function loadConfig(
  overrides: Record<string, unknown> = {},
  sources: ConfigSources = {},
): Promise<RowpagerConfig> {
  const env = sources.env ?? process.env;
  const home = sources.homeDir ?? env.HOME ?? env.USERPROFILE ?? '';

  const userConfig = await loadJSON(resolve(home, '.rowpager', 'config.json'));
  const workspaceConfig = await loadJSON(resolve(sources.workspaceDir ?? '.', 'rowpager.json'));
  const envConfig = loadEnvVars(env);

  const merged = deepMerge(userConfig, workspaceConfig, envConfig, overrides);

  return RowpagerConfigSchema.parse(merged);
}

function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const server: Record<string, unknown> = {};
  if (env.ROWPAGER_HOST) server.host = env.ROWPAGER_HOST;
  if (env.ROWPAGER_PORT) server.port = env.ROWPAGER_PORT;

  const result: Record<string, unknown> = {};
  if (Object.keys(server).length > 0) result.server = server;
  if (env.ROWPAGER_DATABASE) result.database = { path: env.ROWPAGER_DATABASE };
  if (env.ROWPAGER_LOG_LEVEL) result.log = { level: env.ROWPAGER_LOG_LEVEL };

  return result;
}

async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return {};
  }
  const parsed: unknown = JSON.parse(content);
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const existing = result[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
