/**
 * Shell Executor
 *
 * Runs one command string through the user's shell inside its own process
 * group. The group is terminated as a unit when the timeout fires and is
 * swept again before the call resolves, so nothing the command started
 * outlives it.
 */

import { spawn, type ChildProcess } from 'child_process';
import * as os from 'os';
import * as path from 'path';

export interface ExecutionResult {
  /** Real exit status; null on timeout or launch failure. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set only when the command could not be started. */
  error?: string;
}

export type ExecutionOutcome = 'success' | 'non-zero-exit' | 'timeout' | 'spawn-failure';

export interface ShellExecutorOptions {
  cwd?: string;
  timeoutSeconds?: number;
  shell?: string;
  /** Resource file sourced before the command. `null` skips sourcing. */
  rcFile?: string | null;
  killGraceMs?: number;
  env?: Record<string, string>;
  onSpawn?: (pid: number) => void;
}

export type CommandExecutor = (commandText: string, options?: ShellExecutorOptions) => Promise<ExecutionResult>;

export const DEFAULT_TIMEOUT_SECONDS = 10;
export const DEFAULT_KILL_GRACE_MS = 500;

// Upper bound on waiting for stdio to drain once the group has been SIGKILLed.
const FORCE_SETTLE_MS = 1_000;
// Largest delay setTimeout accepts; anything above fires immediately.
const MAX_TIMER_MS = 2_147_483_647;

export function getDefaultShell(): string {
  const fromEnv = String(process.env.SHELL || '').trim();
  if (fromEnv) return fromEnv;
  return process.platform === 'darwin' ? '/bin/zsh' : '/bin/sh';
}

export function getDefaultRcFile(shell: string, homeDir: string = os.homedir()): string {
  const shellName = path.basename(shell);
  if (shellName === 'zsh') return path.join(homeDir, '.zshrc');
  if (shellName === 'bash') return path.join(homeDir, '.bashrc');
  return path.join(homeDir, '.profile');
}

function quoteForShell(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function buildShellScript(commandText: string, rcFile: string | null, shell = ''): string {
  if (!rcFile) return commandText;
  const quoted = quoteForShell(rcFile);
  const source = `if [ -f ${quoted} ]; then . ${quoted} >/dev/null 2>&1; fi`;
  // Non-interactive bash leaves aliases from the rc file unexpanded.
  const prelude = path.basename(shell) === 'bash' ? 'shopt -s expand_aliases\n' : '';
  return `${prelude}${source}\n${commandText}`;
}

export function toTimeoutMs(timeoutSeconds: number | undefined): number {
  const seconds = Number(timeoutSeconds);
  if (!Number.isFinite(seconds) || seconds <= 0) return DEFAULT_TIMEOUT_SECONDS * 1000;
  return Math.min(Math.round(seconds * 1000), MAX_TIMER_MS);
}

function signalToExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  for (const [name, value] of Object.entries(os.constants.signals)) {
    if (name === signal && typeof value === 'number') return 128 + value;
  }
  return 1;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function killProcessGroup(pid: number, signal: NodeJS.Signals): boolean {
  try {
    if (process.platform === 'win32') {
      process.kill(pid, signal);
    } else {
      process.kill(-pid, signal);
    }
    return true;
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code !== 'ESRCH') {
      console.warn(`[Executor] Failed to send ${signal} to process group ${pid}:`, error);
    }
    return false;
  }
}

function spawnFailure(message: string, stdout = '', stderr = ''): ExecutionResult {
  return { exitCode: null, stdout, stderr, timedOut: false, error: message };
}

export function describeExecutionResult(result: ExecutionResult): ExecutionOutcome {
  if (result.error !== undefined) return 'spawn-failure';
  if (result.timedOut) return 'timeout';
  return result.exitCode === 0 ? 'success' : 'non-zero-exit';
}

export function executeCommand(commandText: string, options: ShellExecutorOptions = {}): Promise<ExecutionResult> {
  const command = String(commandText || '').trim();
  if (!command) {
    return Promise.resolve(spawnFailure('Command is empty'));
  }

  const shell = options.shell || getDefaultShell();
  const cwd = options.cwd || os.homedir();
  const rcFile = options.rcFile === undefined ? getDefaultRcFile(shell) : options.rcFile;
  const timeoutMs = toTimeoutMs(options.timeoutSeconds);
  const killGraceMs = Math.max(0, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);

  return new Promise<ExecutionResult>((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let spawnedPid: number | undefined;
    const timers: NodeJS.Timeout[] = [];

    const settle = (result: ExecutionResult) => {
      if (settled) return;
      settled = true;
      for (const timer of timers) clearTimeout(timer);
      if (spawnedPid !== undefined) {
        killProcessGroup(spawnedPid, 'SIGKILL');
      }
      resolve(result);
    };

    let proc: ChildProcess;
    try {
      proc = spawn(shell, ['-c', buildShellScript(command, rcFile, shell)], {
        cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      });
    } catch (error) {
      settle(spawnFailure(getErrorMessage(error)));
      return;
    }

    proc.stdout?.setEncoding('utf-8');
    proc.stderr?.setEncoding('utf-8');
    proc.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    proc.on('error', (error) => {
      if (proc.pid === undefined) {
        settle(spawnFailure(error.message, stdout, stderr));
        return;
      }
      console.warn(`[Executor] Process ${proc.pid} reported an error:`, error);
    });

    proc.on('close', (code, signal) => {
      if (proc.pid === undefined) {
        settle(spawnFailure(`Failed to start ${shell}`, stdout, stderr));
        return;
      }
      if (timedOut) {
        settle({ exitCode: null, stdout, stderr, timedOut: true });
        return;
      }
      settle({ exitCode: code ?? signalToExitCode(signal), stdout, stderr, timedOut: false });
    });

    const pid = proc.pid;
    if (pid === undefined) return;
    spawnedPid = pid;
    options.onSpawn?.(pid);

    timers.push(
      setTimeout(() => {
        timedOut = true;
        console.warn(`[Executor] Timed out after ${timeoutMs / 1000}s, terminating process group ${pid}`);
        killProcessGroup(pid, 'SIGTERM');

        timers.push(
          setTimeout(() => {
            killProcessGroup(pid, 'SIGKILL');
            timers.push(
              setTimeout(() => {
                proc.stdout?.destroy();
                proc.stderr?.destroy();
                settle({ exitCode: null, stdout, stderr, timedOut: true });
              }, FORCE_SETTLE_MS)
            );
          }, killGraceMs)
        );
      }, timeoutMs)
    );
  });
}
