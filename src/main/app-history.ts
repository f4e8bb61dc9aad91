/**
 * App History
 *
 * Usage log of focused or launched applications, keyed by a stable
 * application identifier (bundle id or path), never by display name.
 */

import { z } from 'zod';
import {
  HistoryStore,
  StoredTimestampSchema,
  formatTimestamp,
  parseTimestamp,
  type HistoryCodec,
} from './history-store';

export interface AppUsageRecord {
  appIdentifier: string;
  lastUsedAt: number;
  useCount: number;
}

export type AppHistory = HistoryStore<AppUsageRecord>;

const StoredAppUsageSchema = z.object({
  id: z.string().min(1),
  last_used: StoredTimestampSchema,
  count: z.number().int().positive().optional(),
});

const LegacyAppFileSchema = z.object({
  apps: z.array(z.unknown()),
});

const LEGACY_TIMESTAMP_STEP_MS = 1000;

export const appHistoryCodec: HistoryCodec<AppUsageRecord> = {
  label: 'app',
  keyOf: (record) => record.appIdentifier,
  touch: (existing, key, at) => ({
    appIdentifier: key,
    lastUsedAt: at,
    useCount: existing ? existing.useCount + 1 : 1,
  }),
  encode: (record) => ({
    id: record.appIdentifier,
    last_used: formatTimestamp(record.lastUsedAt),
    count: record.useCount,
  }),
  decode: (raw) => {
    const parsed = StoredAppUsageSchema.safeParse(raw);
    if (!parsed.success || !parsed.data.id.trim()) return null;
    const lastUsedAt = parseTimestamp(parsed.data.last_used);
    if (lastUsedAt === null) return null;
    return {
      appIdentifier: parsed.data.id,
      lastUsedAt,
      useCount: parsed.data.count ?? 1,
    };
  },
  decodeLegacy: (data) => {
    const parsed = LegacyAppFileSchema.safeParse(data);
    if (!parsed.success) return null;
    const now = Date.now();
    return parsed.data.apps
      .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
      .map((appIdentifier, index) => ({
        appIdentifier,
        lastUsedAt: now - index * LEGACY_TIMESTAMP_STEP_MS,
        useCount: 1,
      }));
  },
};

export function createAppHistory(options: { filePath: string; maxItems: number }): AppHistory {
  return new HistoryStore<AppUsageRecord>({ ...options, codec: appHistoryCodec });
}
