/**
 * agent-run Configuration
 *
 * Reads .agent-run/config.json in the current project directory.
 * Falls back to the global config at ~/.agent-run/config.json, then to defaults.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { SEVERITY_LEVELS } from './ontology/index.js';
import { ConfigError } from './shared/errors.js';

/** Directory name for local config */
export const CONFIG_DIR = '.agent-run';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Global config home directory */
export const GLOBAL_CONFIG_DIR = join(homedir(), CONFIG_DIR);

export const AgentRunConfigSchema = z.object({
  version: z.string().default('1'),
  /** Format used when a document matches no detector */
  defaultFormat: z.string().default('agent-traces'),
  timeline: z
    .object({
      includeStepEnd: z.boolean().default(true),
    })
    .default({}),
  flags: z
    .object({
      minSeverity: z.enum(SEVERITY_LEVELS).default('low'),
    })
    .default({}),
});

export type AgentRunConfig = z.infer<typeof AgentRunConfigSchema>;

/**
 * Default configuration.
 */
export function defaultConfig(): AgentRunConfig {
  return AgentRunConfigSchema.parse({});
}

/**
 * Resolve the local config directory for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), CONFIG_DIR);
}

export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

async function readConfigFile(configPath: string): Promise<AgentRunConfig> {
  const raw = await readFile(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config is not valid JSON: ${configPath}`, { cause: err });
  }

  const result = AgentRunConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` (${issue.path.join('.')})` : '';
    throw new ConfigError(`Invalid config ${configPath}${where}: ${issue?.message ?? 'unknown error'}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Load the local config, else the global one, else defaults.
 */
export async function loadConfig(cwd?: string, globalDir = GLOBAL_CONFIG_DIR): Promise<AgentRunConfig> {
  const localPath = localConfigPath(cwd);
  const globalPath = join(globalDir, CONFIG_FILE);

  for (const configPath of [localPath, globalPath]) {
    if (existsSync(configPath)) {
      return readConfigFile(configPath);
    }
  }

  return defaultConfig();
}

/**
 * Save the config to the local .agent-run/ directory.
 */
export async function saveConfig(config: AgentRunConfig, cwd?: string): Promise<void> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, CONFIG_FILE), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}
