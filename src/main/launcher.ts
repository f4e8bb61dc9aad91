/**
 * Launcher
 *
 * Decides whether popup input focuses an app or runs as a shell command, then
 * sequences history, execution and notification for that one submission.
 * A command is written to history before it starts, so a slow or hanging
 * command still shows up under recent commands.
 */

import type { AppHistory } from './app-history';
import { findAppMatch, type AppEntry, type AppFocusCollaborator, type AppMatcher } from './app-catalog';
import { formatMenuLabel, type CommandHistory } from './command-history';
import {
  buildAppFocusFailureNotification,
  buildExecutionNotification,
  dispatchNotification,
  type Notifier,
} from './notifications';
import {
  DEFAULT_TIMEOUT_SECONDS,
  describeExecutionResult,
  executeCommand,
  getErrorMessage,
  type CommandExecutor,
  type ExecutionResult,
  type ShellExecutorOptions,
} from './shell-executor';

export type LauncherState = 'idle' | 'dispatched' | 'app-focused' | 'executing' | 'completed';

export type SubmissionOutcome =
  | { kind: 'ignored' }
  | { kind: 'busy' }
  | { kind: 'app'; app: AppEntry; focused: boolean }
  | { kind: 'command'; command: string; result: ExecutionResult };

export interface LauncherOptions {
  commandHistory: CommandHistory;
  appHistory: AppHistory;
  apps: AppFocusCollaborator;
  notifier: Notifier;
  matchApp?: AppMatcher;
  executor?: CommandExecutor;
  timeoutSeconds?: number;
  workingDirectory?: string;
  shell?: string;
  /** Resource file override passed to the executor; `null` skips sourcing. */
  rcFile?: string | null;
}

export class Launcher {
  private readonly options: LauncherOptions;
  private readonly matchApp: AppMatcher;
  private readonly executor: CommandExecutor;
  private state: LauncherState = 'idle';

  constructor(options: LauncherOptions) {
    this.options = options;
    this.matchApp = options.matchApp || findAppMatch;
    this.executor = options.executor || executeCommand;
  }

  getState(): LauncherState {
    return this.state;
  }

  isBusy(): boolean {
    return this.state !== 'idle';
  }

  getRecentCommands(limit = 10): string[] {
    return this.options.commandHistory.getRecent(limit).map((record) => record.text);
  }

  getRecentCommandMenuItems(limit = 10): Array<{ label: string; command: string }> {
    return this.getRecentCommands(limit).map((command) => ({ label: formatMenuLabel(command), command }));
  }

  async submit(text: string): Promise<SubmissionOutcome> {
    const input = String(text || '').trim();
    if (!input) return { kind: 'ignored' };
    if (this.isBusy()) return { kind: 'busy' };

    this.state = 'dispatched';
    try {
      const app = await this.resolveApp(input);
      if (app) {
        this.state = 'app-focused';
        return await this.focusApp(app);
      }
      return await this.execute(input);
    } finally {
      this.state = 'idle';
    }
  }

  /** Runs text as a command without app matching, e.g. from the recent-commands menu. */
  async runCommand(text: string): Promise<SubmissionOutcome> {
    const command = String(text || '').trim();
    if (!command) return { kind: 'ignored' };
    if (this.isBusy()) return { kind: 'busy' };

    this.state = 'dispatched';
    try {
      return await this.execute(command);
    } finally {
      this.state = 'idle';
    }
  }

  private async resolveApp(input: string): Promise<AppEntry | null> {
    let apps: AppEntry[] = [];
    try {
      apps = await this.options.apps.listApps();
    } catch (error) {
      console.warn(`[Launcher] Could not list apps: ${getErrorMessage(error)}`);
    }
    if (apps.length === 0) return null;

    const appHistory = this.options.appHistory;
    return this.matchApp(apps, input, (identifier) => appHistory.getRecency(identifier));
  }

  private async focusApp(app: AppEntry): Promise<SubmissionOutcome> {
    let focused = false;
    let reason: string | undefined;
    try {
      focused = await this.options.apps.activateOrLaunch(app.identifier);
    } catch (error) {
      reason = getErrorMessage(error);
    }

    if (!focused) {
      console.warn(`[Launcher] Failed to open ${app.displayName} (${app.identifier})${reason ? `: ${reason}` : ''}`);
      dispatchNotification(this.options.notifier, buildAppFocusFailureNotification(app, reason));
      this.state = 'completed';
      return { kind: 'app', app, focused: false };
    }

    this.options.appHistory.record(app.identifier);
    this.state = 'completed';
    return { kind: 'app', app, focused: true };
  }

  private async execute(command: string): Promise<SubmissionOutcome> {
    this.options.commandHistory.record(command);

    this.state = 'executing';
    console.log(`[Launcher] Executing: ${command}`);
    let result: ExecutionResult;
    try {
      result = await this.executor(command, this.getExecutorOptions());
    } catch (error) {
      result = { exitCode: null, stdout: '', stderr: '', timedOut: false, error: getErrorMessage(error) };
    }
    console.log(`[Launcher] Result: ${describeExecutionResult(result)}`);
    this.state = 'completed';

    dispatchNotification(
      this.options.notifier,
      buildExecutionNotification(command, result, this.getTimeoutSeconds())
    );
    return { kind: 'command', command, result };
  }

  private getTimeoutSeconds(): number {
    return this.options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
  }

  private getExecutorOptions(): ShellExecutorOptions {
    const executorOptions: ShellExecutorOptions = {
      timeoutSeconds: this.getTimeoutSeconds(),
      cwd: this.options.workingDirectory,
      shell: this.options.shell,
    };
    if (this.options.rcFile !== undefined) {
      executorOptions.rcFile = this.options.rcFile;
    }
    return executorOptions;
  }
}
