/**
 * launcher.test.ts
 *
 * Decision rule and ordering: app input focuses the app, everything else is
 * recorded in command history before it runs, and a notification follows.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import type { AppEntry, AppFocusCollaborator } from '../app-catalog';
import { createAppHistory, type AppHistory } from '../app-history';
import { createCommandHistory, type CommandHistory } from '../command-history';
import { Launcher, type LauncherOptions } from '../launcher';
import type { NotificationPayload, Notifier } from '../notifications';
import type { CommandExecutor, ExecutionResult } from '../shell-executor';
import { makeTempDir } from './helpers/process-table';

const EDITOR: AppEntry = { identifier: 'com.example.editor', displayName: 'Editor', isRunning: true };
const CALENDAR: AppEntry = { identifier: 'com.example.calendar', displayName: 'Calendar', isRunning: false };

let tmpDir = '';
let commandHistory: CommandHistory;
let appHistory: AppHistory;
let notifications: NotificationPayload[];
let notifier: Notifier;

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function appsCollaborator(apps: AppEntry[], activate: (identifier: string) => boolean | Promise<boolean> = () => true) {
  const collaborator: AppFocusCollaborator = {
    listApps: vi.fn(() => apps),
    activateOrLaunch: vi.fn(activate),
  };
  return collaborator;
}

function createLauncherUnderTest(overrides: Partial<LauncherOptions> = {}): Launcher {
  return new Launcher({
    commandHistory,
    appHistory,
    apps: appsCollaborator([]),
    notifier,
    shell: '/bin/sh',
    rcFile: null,
    workingDirectory: tmpDir,
    timeoutSeconds: 10,
    ...overrides,
  });
}

const OK_RESULT: ExecutionResult = { exitCode: 0, stdout: 'done\n', stderr: '', timedOut: false };

beforeEach(() => {
  tmpDir = makeTempDir('quickrun-launcher-');
  commandHistory = createCommandHistory({ filePath: path.join(tmpDir, 'history.json'), maxItems: 100 });
  appHistory = createAppHistory({ filePath: path.join(tmpDir, 'apps.json'), maxItems: 50 });
  notifications = [];
  notifier = {
    notify: (title, body, isError) => {
      notifications.push({ title, body, isError });
    },
  };
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('Launcher.submit', () => {
  it('ignores blank input without touching history or the executor', async () => {
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const launcher = createLauncherUnderTest({ executor });

    await expect(launcher.submit('   ')).resolves.toEqual({ kind: 'ignored' });
    expect(executor).not.toHaveBeenCalled();
    expect(commandHistory.size).toBe(0);
    expect(notifications).toEqual([]);
  });

  it('runs a real command, records it and notifies success', async () => {
    const launcher = createLauncherUnderTest();

    const outcome = await launcher.submit('  echo hello  ');

    expect(outcome).toEqual({
      kind: 'command',
      command: 'echo hello',
      result: { exitCode: 0, stdout: 'hello\n', stderr: '', timedOut: false },
    });
    expect(commandHistory.getAll()[0].text).toBe('echo hello');
    expect(notifications).toEqual([{ title: 'Command Succeeded', body: '$ echo hello\nhello', isError: false }]);
    expect(launcher.getState()).toBe('idle');
  });

  it('records the command before execution starts and persists it', async () => {
    const pending = deferred<ExecutionResult>();
    let historyAtStart: string[] = [];
    let fileAtStart: unknown = null;
    const executor = vi.fn<CommandExecutor>(() => {
      historyAtStart = commandHistory.getAll().map((record) => record.text);
      fileAtStart = JSON.parse(fs.readFileSync(commandHistory.filePath, 'utf-8'));
      return pending.promise;
    });
    const launcher = createLauncherUnderTest({ executor });

    const submission = launcher.submit('sleep 5');
    await vi.waitFor(() => expect(executor).toHaveBeenCalledTimes(1));

    expect(historyAtStart).toEqual(['sleep 5']);
    expect(fileAtStart).toEqual([{ text: 'sleep 5', last_used: expect.any(String) }]);
    expect(launcher.getState()).toBe('executing');
    expect(notifications).toEqual([]);

    pending.resolve(OK_RESULT);
    await submission;
    expect(notifications).toHaveLength(1);
  });

  it('shows a slow command in history while it is still running', async () => {
    const launcher = createLauncherUnderTest({ timeoutSeconds: 1 });

    const submission = launcher.submit('sleep 5');
    await vi.waitFor(() => expect(launcher.getState()).toBe('executing'));

    const onDisk = JSON.parse(fs.readFileSync(commandHistory.filePath, 'utf-8'));
    expect(onDisk[0].text).toBe('sleep 5');

    const outcome = await submission;
    expect(outcome.kind === 'command' && outcome.result.timedOut).toBe(true);
    expect(notifications).toEqual([
      { title: 'Command Timed Out', body: '$ sleep 5\nTimed out after 1s', isError: true },
    ]);
  });

  it('passes timeout, working directory and shell settings to the executor', async () => {
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const launcher = createLauncherUnderTest({ executor, timeoutSeconds: 3 });

    await launcher.submit('make');

    expect(executor).toHaveBeenCalledWith('make', {
      timeoutSeconds: 3,
      cwd: tmpDir,
      shell: '/bin/sh',
      rcFile: null,
    });
  });

  it('rejects a second submission while one is in flight', async () => {
    const pending = deferred<ExecutionResult>();
    const executor = vi.fn<CommandExecutor>(() => pending.promise);
    const launcher = createLauncherUnderTest({ executor });

    const first = launcher.submit('long-task');
    await vi.waitFor(() => expect(executor).toHaveBeenCalledTimes(1));

    await expect(launcher.submit('second')).resolves.toEqual({ kind: 'busy' });
    await expect(launcher.runCommand('third')).resolves.toEqual({ kind: 'busy' });
    expect(commandHistory.getAll().map((record) => record.text)).toEqual(['long-task']);

    pending.resolve(OK_RESULT);
    await first;
    expect(launcher.isBusy()).toBe(false);
    await expect(launcher.submit('second')).resolves.toMatchObject({ kind: 'command', command: 'second' });
  });

  it('focuses a matching app and records its identifier instead of running a command', async () => {
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const apps = appsCollaborator([EDITOR, CALENDAR]);
    const launcher = createLauncherUnderTest({ executor, apps });

    const outcome = await launcher.submit('edit');

    expect(outcome).toEqual({ kind: 'app', app: EDITOR, focused: true });
    expect(apps.activateOrLaunch).toHaveBeenCalledWith('com.example.editor');
    expect(executor).not.toHaveBeenCalled();
    expect(commandHistory.size).toBe(0);
    expect(appHistory.getAll()).toEqual([
      { appIdentifier: 'com.example.editor', lastUsedAt: expect.any(Number), useCount: 1 },
    ]);
    expect(notifications).toEqual([]);
  });

  it('notifies and does not fall back to a command when the app cannot be opened', async () => {
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const apps = appsCollaborator([CALENDAR], () => false);
    const launcher = createLauncherUnderTest({ executor, apps });

    const outcome = await launcher.submit('calendar');

    expect(outcome).toEqual({ kind: 'app', app: CALENDAR, focused: false });
    expect(executor).not.toHaveBeenCalled();
    expect(appHistory.size).toBe(0);
    expect(notifications).toEqual([{ title: 'App Failed to Open', body: 'Calendar', isError: true }]);
  });

  it('includes the reason when activation throws', async () => {
    const apps = appsCollaborator([CALENDAR], () => {
      throw new Error('not permitted');
    });
    const launcher = createLauncherUnderTest({ apps });

    await expect(launcher.submit('cal')).resolves.toEqual({ kind: 'app', app: CALENDAR, focused: false });
    expect(notifications).toEqual([{ title: 'App Failed to Open', body: 'Calendar\nnot permitted', isError: true }]);
  });

  it('treats input as a command when listing apps fails', async () => {
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const apps: AppFocusCollaborator = {
      listApps: () => Promise.reject(new Error('no accessibility permission')),
      activateOrLaunch: vi.fn(() => true),
    };
    const launcher = createLauncherUnderTest({ executor, apps });

    await expect(launcher.submit('edit')).resolves.toMatchObject({ kind: 'command', command: 'edit' });
    expect(apps.activateOrLaunch).not.toHaveBeenCalled();
  });

  it('uses a custom matcher supplied by the UI', async () => {
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const apps = appsCollaborator([EDITOR]);
    const launcher = createLauncherUnderTest({ executor, apps, matchApp: () => null });

    await expect(launcher.submit('Editor')).resolves.toMatchObject({ kind: 'command', command: 'Editor' });
    expect(apps.activateOrLaunch).not.toHaveBeenCalled();
  });

  it('records a spawn failure in history and notifies the error', async () => {
    const launcher = createLauncherUnderTest({ shell: path.join(tmpDir, 'missing-shell') });

    const outcome = await launcher.submit('echo hi');

    expect(outcome.kind).toBe('command');
    expect(commandHistory.getAll()[0].text).toBe('echo hi');
    expect(notifications).toHaveLength(1);
    expect(notifications[0].title).toBe('Command Failed to Start');
    expect(notifications[0].isError).toBe(true);
  });

  it('converts a rejecting executor into a spawn failure', async () => {
    const executor = vi.fn<CommandExecutor>(async () => {
      throw new Error('executor crashed');
    });
    const launcher = createLauncherUnderTest({ executor });

    await expect(launcher.submit('ls')).resolves.toEqual({
      kind: 'command',
      command: 'ls',
      result: { exitCode: null, stdout: '', stderr: '', timedOut: false, error: 'executor crashed' },
    });
    expect(notifications).toEqual([{ title: 'Command Failed to Start', body: '$ ls\nexecutor crashed', isError: true }]);
  });

  it('reports non-zero exits with the exit code and stderr', async () => {
    const launcher = createLauncherUnderTest();

    await launcher.submit('echo broken >&2; exit 2');

    expect(notifications).toEqual([
      { title: 'Command Failed', body: '$ echo broken >&2; exit 2\nExit code: 2\nbroken', isError: true },
    ]);
  });

  it('keeps running when history cannot be written', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, '', 'utf-8');
    vi.spyOn(console, 'error').mockImplementation(() => {});
    commandHistory = createCommandHistory({ filePath: path.join(blocker, 'history.json'), maxItems: 10 });
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const launcher = createLauncherUnderTest({ executor });

    await expect(launcher.submit('ls')).resolves.toMatchObject({ kind: 'command', command: 'ls' });
    expect(executor).toHaveBeenCalledTimes(1);
  });

  it('swallows notifier failures', async () => {
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const failing: Notifier = {
      notify: () => {
        throw new Error('notification center unavailable');
      },
    };
    const launcher = createLauncherUnderTest({ executor, notifier: failing });

    await expect(launcher.submit('ls')).resolves.toMatchObject({ kind: 'command' });
  });
});

describe('Launcher.runCommand', () => {
  it('skips app matching', async () => {
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const apps = appsCollaborator([EDITOR]);
    const launcher = createLauncherUnderTest({ executor, apps });

    await expect(launcher.runCommand('Editor')).resolves.toMatchObject({ kind: 'command', command: 'Editor' });
    expect(apps.listApps).not.toHaveBeenCalled();
  });
});

describe('recent commands', () => {
  it('lists recent commands with menu labels', async () => {
    const executor = vi.fn<CommandExecutor>(async () => OK_RESULT);
    const launcher = createLauncherUnderTest({ executor });
    const longCommand = 'find . -name "*.ts" -not -path "./node_modules/*" -print';

    await launcher.submit('ls');
    await launcher.submit(longCommand);

    expect(launcher.getRecentCommands()).toEqual([longCommand, 'ls']);
    expect(launcher.getRecentCommandMenuItems(1)).toEqual([
      { label: 'find . -name "*.ts" -not -path "./nod...', command: longCommand },
    ]);
  });
});
