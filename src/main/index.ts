/**
 * Composition root: loads config and history once and wires the launcher to
 * the platform collaborators supplied by the host UI.
 */

import { createAppHistory, type AppHistory } from './app-history';
import type { AppFocusCollaborator, AppMatcher } from './app-catalog';
import { createCommandHistory, type CommandHistory } from './command-history';
import type { LauncherConfig } from './launcher-config';
import { Launcher } from './launcher';
import { consoleNotifier, type Notifier } from './notifications';

export interface LauncherCollaborators {
  apps?: AppFocusCollaborator;
  notifier?: Notifier;
  matchApp?: AppMatcher;
}

export interface LauncherRuntime {
  launcher: Launcher;
  commandHistory: CommandHistory;
  appHistory: AppHistory;
}

export const noAppsCollaborator: AppFocusCollaborator = {
  listApps: () => [],
  activateOrLaunch: () => false,
};

export function createLauncher(config: LauncherConfig, collaborators: LauncherCollaborators = {}): LauncherRuntime {
  const commandHistory = createCommandHistory({
    filePath: config.commandHistoryPath,
    maxItems: config.maxCommandHistory,
  });
  const appHistory = createAppHistory({
    filePath: config.appHistoryPath,
    maxItems: config.maxAppHistory,
  });
  commandHistory.load();
  appHistory.load();

  const launcher = new Launcher({
    commandHistory,
    appHistory,
    apps: collaborators.apps || noAppsCollaborator,
    notifier: collaborators.notifier || consoleNotifier,
    matchApp: collaborators.matchApp,
    timeoutSeconds: config.commandTimeoutSeconds,
    workingDirectory: config.workingDirectory,
    shell: config.shell,
    rcFile: config.rcFile,
  });

  return { launcher, commandHistory, appHistory };
}

export * from './app-catalog';
export * from './app-history';
export * from './command-history';
export * from './history-store';
export * from './launcher';
export * from './launcher-config';
export * from './notifications';
export * from './shell-executor';
