/**
 * Notifications
 *
 * Builds the payloads shown after a submission and hands them to the
 * desktop notification layer. Delivery is fire-and-forget.
 */

import type { AppEntry } from './app-catalog';
import { describeExecutionResult, getErrorMessage, type ExecutionResult } from './shell-executor';

export interface NotificationPayload {
  title: string;
  body: string;
  isError: boolean;
}

export interface Notifier {
  notify(title: string, body: string, isError: boolean): void | Promise<void>;
}

const MAX_COMMAND_LENGTH = 50;
const MAX_OUTPUT_LENGTH = 200;

export function truncateText(text: string, maxLength: number = MAX_OUTPUT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

function commandLine(command: string): string {
  return `$ ${truncateText(command, MAX_COMMAND_LENGTH)}`;
}

export function buildExecutionNotification(
  command: string,
  result: ExecutionResult,
  timeoutSeconds?: number
): NotificationPayload {
  switch (describeExecutionResult(result)) {
    case 'success': {
      const output = result.stdout.trim();
      return {
        title: 'Command Succeeded',
        body: `${commandLine(command)}\n${output ? truncateText(output) : '(no output)'}`,
        isError: false,
      };
    }
    case 'timeout': {
      const lines = [
        commandLine(command),
        timeoutSeconds ? `Timed out after ${timeoutSeconds}s` : 'Command timed out',
      ];
      const stderr = result.stderr.trim();
      if (stderr) lines.push(truncateText(stderr));
      return { title: 'Command Timed Out', body: lines.join('\n'), isError: true };
    }
    case 'spawn-failure':
      return {
        title: 'Command Failed to Start',
        body: `${commandLine(command)}\n${truncateText(result.error || 'Unknown error')}`,
        isError: true,
      };
    case 'non-zero-exit': {
      const lines = [commandLine(command), `Exit code: ${result.exitCode}`];
      const stderr = result.stderr.trim();
      if (stderr) lines.push(truncateText(stderr));
      return { title: 'Command Failed', body: lines.join('\n'), isError: true };
    }
  }
}

export function buildAppFocusFailureNotification(app: AppEntry, reason?: string): NotificationPayload {
  const lines = [app.displayName];
  if (reason) lines.push(truncateText(reason));
  return { title: 'App Failed to Open', body: lines.join('\n'), isError: true };
}

export function dispatchNotification(notifier: Notifier, payload: NotificationPayload): void {
  const report = (error: unknown) => {
    console.warn(`[Notify] Failed to deliver "${payload.title}": ${getErrorMessage(error)}`);
  };

  try {
    const pending = notifier.notify(payload.title, payload.body, payload.isError);
    if (pending instanceof Promise) {
      pending.catch(report);
    }
  } catch (error) {
    report(error);
  }
}

export const consoleNotifier: Notifier = {
  notify(title, body, isError) {
    const log = isError ? console.error : console.log;
    log(`[Notify] ${title}\n${body}`);
  },
};
