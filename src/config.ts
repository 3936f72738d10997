import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { ThemeName } from './themes.js';
import { isCommand, type Command, type Keymap } from './KeyBindings.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('config');

export interface Config {
  theme: ThemeName;
  /** Commits listed under "Recent commits". */
  recentCommitLimit: number;
  /** Ask git for colored diffs and keep its colors. */
  colorDiff: boolean;
  /** Key name to command, layered over the default keymap. */
  keymap: Keymap;
  debug: boolean;
}

export const MIN_COMMIT_LIMIT = 1;
export const MAX_COMMIT_LIMIT = 200;

const defaultConfig: Config = {
  theme: 'dark',
  recentCommitLimit: 10,
  colorDiff: false,
  keymap: {},
  debug: false,
};

export const CONFIG_PATH = path.join(os.homedir(), '.config', 'gitfold', 'config.json');

export const VALID_THEMES: ThemeName[] = ['dark', 'light', 'dark-ansi', 'light-ansi'];

export function isValidTheme(theme: unknown): theme is ThemeName {
  return typeof theme === 'string' && (VALID_THEMES as string[]).includes(theme);
}

/**
 * Commit limit from a number or numeric string; null when out of range.
 */
export function parseCommitLimit(value: unknown): number | null {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n)) return null;
  return n >= MIN_COMMIT_LIMIT && n <= MAX_COMMIT_LIMIT ? n : null;
}

function parseBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (value === '1' || value === 'true') return true;
  if (value === '0' || value === 'false') return false;
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep the bindings whose value names a command.
 */
function parseKeymap(value: unknown): Record<string, Command> {
  const keymap: Record<string, Command> = {};
  if (!isRecord(value)) return keymap;
  for (const [key, command] of Object.entries(value)) {
    if (isCommand(command)) keymap[key] = command;
    else log.warn('Ignoring key binding', { key, command: String(command) });
  }
  return keymap;
}

function applyFileConfig(config: Config, fileConfig: Record<string, unknown>): void {
  if (isValidTheme(fileConfig.theme)) config.theme = fileConfig.theme;

  const limit = parseCommitLimit(fileConfig.recentCommitLimit);
  if (limit !== null) config.recentCommitLimit = limit;

  if (typeof fileConfig.colorDiff === 'boolean') config.colorDiff = fileConfig.colorDiff;
  if (typeof fileConfig.debug === 'boolean') config.debug = fileConfig.debug;

  config.keymap = parseKeymap(fileConfig.keymap);
}

function applyEnv(config: Config, env: NodeJS.ProcessEnv): void {
  if (isValidTheme(env.GITFOLD_THEME)) config.theme = env.GITFOLD_THEME;

  const limit = parseCommitLimit(env.GITFOLD_RECENT_COMMITS);
  if (limit !== null) config.recentCommitLimit = limit;

  const colorDiff = parseBoolean(env.GITFOLD_COLOR_DIFF);
  if (colorDiff !== null) config.colorDiff = colorDiff;

  const debug = parseBoolean(env.GITFOLD_DEBUG);
  if (debug !== null) config.debug = debug;
}

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Defaults, then the config file, then `GITFOLD_*` environment variables.
 * Values that fail validation are skipped.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.path ?? CONFIG_PATH;
  const config: Config = { ...defaultConfig };

  if (fs.existsSync(configPath)) {
    try {
      const fileConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      if (isRecord(fileConfig)) applyFileConfig(config, fileConfig);
      else log.warn('Ignoring config: not a JSON object', { path: configPath });
    } catch (err) {
      log.warn('Ignoring config', {
        path: configPath,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  applyEnv(config, options.env ?? process.env);
  return config;
}
