/**
 * Launcher Config
 *
 * Load-time settings for the launcher core. Values come from
 * ~/.config/quickrun/config.json, which is created with defaults on first run.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

export interface LauncherConfig {
  commandTimeoutSeconds: number;
  maxCommandHistory: number;
  maxAppHistory: number;
  commandHistoryPath: string;
  appHistoryPath: string;
  shell?: string;
  /** Resource file sourced before each command; `null` disables sourcing. */
  rcFile?: string | null;
  workingDirectory: string;
}

export const DEFAULT_COMMAND_TIMEOUT_SECONDS = 10;
export const DEFAULT_MAX_COMMAND_HISTORY = 100;
export const DEFAULT_MAX_APP_HISTORY = 50;

const COMMAND_HISTORY_FILE_NAME = '.quickrun_history.json';
const APP_HISTORY_FILE_NAME = '.quickrun_app_history.json';

const PositiveIntegerSchema = z.number().int().positive();
const TimeoutSecondsSchema = z.number().positive().max(24 * 60 * 60);
const PathSchema = z.string().trim().min(1);

const ConfigFileSchema = z.record(z.string(), z.unknown());

const DEFAULT_CONFIG_FILE_CONTENTS = {
  commandTimeoutSeconds: DEFAULT_COMMAND_TIMEOUT_SECONDS,
  maxCommandHistory: DEFAULT_MAX_COMMAND_HISTORY,
  maxAppHistory: DEFAULT_MAX_APP_HISTORY,
};

export function getDefaultConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.config', 'quickrun', 'config.json');
}

export function expandHomePath(value: string, homeDir: string = os.homedir()): string {
  if (value === '~') return homeDir;
  if (value.startsWith('~/')) return path.join(homeDir, value.slice(2));
  return value;
}

export function getDefaultLauncherConfig(homeDir: string = os.homedir()): LauncherConfig {
  return {
    commandTimeoutSeconds: DEFAULT_COMMAND_TIMEOUT_SECONDS,
    maxCommandHistory: DEFAULT_MAX_COMMAND_HISTORY,
    maxAppHistory: DEFAULT_MAX_APP_HISTORY,
    commandHistoryPath: path.join(homeDir, COMMAND_HISTORY_FILE_NAME),
    appHistoryPath: path.join(homeDir, APP_HISTORY_FILE_NAME),
    workingDirectory: homeDir,
  };
}

function ensureConfigFileExists(configPath: string): void {
  if (fs.existsSync(configPath)) return;
  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, `${JSON.stringify(DEFAULT_CONFIG_FILE_CONTENTS, null, 2)}\n`, 'utf-8');
    console.log(`[Config] Created default config at ${configPath}`);
  } catch (error) {
    console.warn(`[Config] Could not create default config at ${configPath}:`, error);
  }
}

function readConfigFile(configPath: string): Record<string, unknown> {
  try {
    if (!fs.existsSync(configPath)) return {};
    const parsed = ConfigFileSchema.safeParse(JSON.parse(fs.readFileSync(configPath, 'utf-8')));
    if (!parsed.success) {
      console.warn(`[Config] Ignoring ${configPath}: expected a JSON object`);
      return {};
    }
    return parsed.data;
  } catch (error) {
    console.warn(`[Config] Failed to load config from ${configPath}:`, error);
    return {};
  }
}

function readField<T>(raw: Record<string, unknown>, key: keyof LauncherConfig, schema: z.ZodType<T>): T | undefined {
  if (raw[key] === undefined) return undefined;
  const result = schema.safeParse(raw[key]);
  if (!result.success) {
    console.warn(`[Config] Invalid value for "${key}", using default`);
    return undefined;
  }
  return result.data;
}

export function parseLauncherConfig(
  raw: Record<string, unknown>,
  homeDir: string = os.homedir()
): LauncherConfig {
  const config = getDefaultLauncherConfig(homeDir);
  const resolvePath = (value: string) => path.resolve(expandHomePath(value, homeDir));

  const commandTimeoutSeconds = readField(raw, 'commandTimeoutSeconds', TimeoutSecondsSchema);
  if (commandTimeoutSeconds !== undefined) config.commandTimeoutSeconds = commandTimeoutSeconds;

  const maxCommandHistory = readField(raw, 'maxCommandHistory', PositiveIntegerSchema);
  if (maxCommandHistory !== undefined) config.maxCommandHistory = maxCommandHistory;

  const maxAppHistory = readField(raw, 'maxAppHistory', PositiveIntegerSchema);
  if (maxAppHistory !== undefined) config.maxAppHistory = maxAppHistory;

  const commandHistoryPath = readField(raw, 'commandHistoryPath', PathSchema);
  if (commandHistoryPath) config.commandHistoryPath = resolvePath(commandHistoryPath);

  const appHistoryPath = readField(raw, 'appHistoryPath', PathSchema);
  if (appHistoryPath) config.appHistoryPath = resolvePath(appHistoryPath);

  const workingDirectory = readField(raw, 'workingDirectory', PathSchema);
  if (workingDirectory) config.workingDirectory = resolvePath(workingDirectory);

  const shell = readField(raw, 'shell', PathSchema);
  if (shell) config.shell = expandHomePath(shell, homeDir);

  if (raw.rcFile === null) {
    config.rcFile = null;
  } else {
    const rcFile = readField(raw, 'rcFile', PathSchema);
    if (rcFile) config.rcFile = resolvePath(rcFile);
  }

  return config;
}

export function loadLauncherConfig(options: { configPath?: string; homeDir?: string } = {}): Readonly<LauncherConfig> {
  const homeDir = options.homeDir || os.homedir();
  const configPath = options.configPath || getDefaultConfigPath(homeDir);
  ensureConfigFileExists(configPath);
  return Object.freeze(parseLauncherConfig(readConfigFile(configPath), homeDir));
}
