import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { ConfigSchema, type Config } from './schemas.js';

/**
 * Directory holding config.json and state.json.
 * `PR_WATCH_HOME` overrides the default `~/.pr-watch`.
 */
export function getHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.PR_WATCH_HOME ? path.resolve(env.PR_WATCH_HOME) : path.join(homedir(), '.pr-watch');
}

export function defaultConfigPath(env?: NodeJS.ProcessEnv): string {
  return path.join(getHomeDir(env), 'config.json');
}

export function defaultStatePath(env?: NodeJS.ProcessEnv): string {
  return path.join(getHomeDir(env), 'state.json');
}

/** Contents written by `pr-watch init` */
export const STARTER_CONFIG: Config = {
  pollIntervalSeconds: 300,
  repos: [],
  sound: true,
  notifyChangesSinceLastRun: false,
};

/**
 * Parse and validate configuration JSON text.
 * Throws ConfigError with every validation issue on one line each.
 */
export function parseConfig(text: string, filePath: string): Config {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in ${filePath}: ${reason}`, filePath);
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${filePath}:\n${z.prettifyError(result.error)}`, filePath);
  }
  return result.data;
}

/** Read and validate the configuration file */
export async function loadConfig(filePath: string): Promise<Config> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config ${filePath}: ${reason}`, filePath);
  }
  return parseConfig(text, filePath);
}

/**
 * Write a starter config. Refuses to overwrite an existing file unless `force`.
 * Returns false when the file already existed and was left alone.
 */
export async function writeStarterConfig(filePath: string, force = false): Promise<boolean> {
  await mkdir(path.dirname(filePath), { recursive: true });
  try {
    await writeFile(filePath, JSON.stringify(STARTER_CONFIG, null, 2) + '\n', {
      encoding: 'utf-8',
      flag: force ? 'w' : 'wx',
    });
    return true;
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}
