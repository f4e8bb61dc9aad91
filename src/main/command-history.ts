/**
 * Command History
 *
 * Recently submitted shell commands, keyed by their exact text.
 */

import { z } from 'zod';
import {
  HistoryStore,
  StoredTimestampSchema,
  formatTimestamp,
  parseTimestamp,
  type HistoryCodec,
} from './history-store';

export interface CommandRecord {
  text: string;
  lastUsedAt: number;
}

export type CommandHistory = HistoryStore<CommandRecord>;

const StoredCommandSchema = z.object({
  text: z.string().min(1),
  last_used: StoredTimestampSchema,
});

const LegacyCommandFileSchema = z.object({
  commands: z.array(z.unknown()),
});

// Legacy files carry no timestamps; keep their order with one-second steps.
const LEGACY_TIMESTAMP_STEP_MS = 1000;

export const commandHistoryCodec: HistoryCodec<CommandRecord> = {
  label: 'command',
  keyOf: (record) => record.text,
  touch: (_existing, key, at) => ({ text: key, lastUsedAt: at }),
  encode: (record) => ({
    text: record.text,
    last_used: formatTimestamp(record.lastUsedAt),
  }),
  decode: (raw) => {
    const parsed = StoredCommandSchema.safeParse(raw);
    if (!parsed.success || !parsed.data.text.trim()) return null;
    const lastUsedAt = parseTimestamp(parsed.data.last_used);
    if (lastUsedAt === null) return null;
    return { text: parsed.data.text, lastUsedAt };
  },
  decodeLegacy: (data) => {
    const parsed = LegacyCommandFileSchema.safeParse(data);
    if (!parsed.success) return null;
    const now = Date.now();
    return parsed.data.commands
      .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
      .map((text, index) => ({ text, lastUsedAt: now - index * LEGACY_TIMESTAMP_STEP_MS }));
  },
};

export function createCommandHistory(options: { filePath: string; maxItems: number }): CommandHistory {
  return new HistoryStore<CommandRecord>({ ...options, codec: commandHistoryCodec });
}

export function formatMenuLabel(command: string, maxLength = 40): string {
  if (command.length <= maxLength) return command;
  return `${command.slice(0, Math.max(0, maxLength - 3))}...`;
}
