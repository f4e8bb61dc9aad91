/**
 * History Store
 *
 * Bounded, most-recently-used list of records persisted as a JSON array.
 * Each record is unique by key; touching a key moves it to the front and the
 * tail is evicted once the list grows past its maximum. Writes go to a temp
 * file that is renamed over the target, so an interrupted write leaves the
 * previous file intact.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export interface HistoryCodec<TRecord extends object> {
  /** Name used in log lines, e.g. "command". */
  label: string;
  keyOf(record: TRecord): string;
  /** Builds the promoted record; `existing` is undefined on first use. */
  touch(existing: TRecord | undefined, key: string, at: number): TRecord;
  encode(record: TRecord): unknown;
  decode(raw: unknown): TRecord | null;
  /** Reads files written in an older, non-array layout. */
  decodeLegacy?(data: unknown): TRecord[] | null;
}

export interface HistoryStoreOptions<TRecord extends object> {
  filePath: string;
  maxItems: number;
  codec: HistoryCodec<TRecord>;
}

export const StoredTimestampSchema = z.union([z.string().min(1), z.number().nonnegative()]);

// Numbers below this are epoch seconds rather than milliseconds.
const EPOCH_MS_THRESHOLD = 100_000_000_000;

export function parseTimestamp(value: string | number): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return value < EPOCH_MS_THRESHOLD ? Math.round(value * 1000) : Math.round(value);
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

export function formatTimestamp(value: number): string {
  return new Date(value).toISOString();
}

export class HistoryStore<TRecord extends object> {
  readonly filePath: string;
  readonly maxItems: number;
  private readonly codec: HistoryCodec<TRecord>;
  private items: TRecord[] | null = null;

  constructor(options: HistoryStoreOptions<TRecord>) {
    this.filePath = options.filePath;
    this.maxItems = Math.max(1, Math.floor(options.maxItems));
    this.codec = options.codec;
  }

  load(): TRecord[] {
    this.items = this.loadFromDisk();
    console.log(`[History] Loaded ${this.items.length} ${this.codec.label} record(s)`);
    return this.getAll();
  }

  get size(): number {
    return this.ensureLoaded().length;
  }

  getAll(): TRecord[] {
    return this.ensureLoaded().map((record) => ({ ...record }));
  }

  getRecent(limit = 10): TRecord[] {
    return this.getAll().slice(0, Math.max(0, limit));
  }

  get(key: string): TRecord | null {
    const found = this.ensureLoaded().find((record) => this.codec.keyOf(record) === key);
    return found ? { ...found } : null;
  }

  has(key: string): boolean {
    return this.indexOf(key) !== -1;
  }

  /** Position in most-recent-first order; Infinity when the key is unknown. */
  getRecency(key: string): number {
    const index = this.indexOf(key);
    return index === -1 ? Number.POSITIVE_INFINITY : index;
  }

  touch(key: string, at: number = Date.now()): void {
    if (!key || !key.trim()) return;
    const all = this.ensureLoaded();

    const index = this.indexOf(key);
    const existing = index === -1 ? undefined : all[index];
    if (index !== -1) all.splice(index, 1);

    all.unshift(this.codec.touch(existing, key, at));
    if (all.length > this.maxItems) {
      all.length = this.maxItems;
    }
  }

  /** Touch followed by a write-through persist. */
  record(key: string, at?: number): boolean {
    if (!key || !key.trim()) return false;
    this.touch(key, at);
    return this.persist();
  }

  remove(key: string): boolean {
    const index = this.indexOf(key);
    if (index === -1) return false;
    this.ensureLoaded().splice(index, 1);
    this.persist();
    return true;
  }

  clear(): void {
    this.items = [];
    this.persist();
  }

  persist(): boolean {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      const payload = JSON.stringify(this.ensureLoaded().map((record) => this.codec.encode(record)), null, 2);
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, `${payload}\n`, 'utf-8');
      fs.renameSync(tempPath, this.filePath);
      return true;
    } catch (error) {
      console.error(`[History] Failed to save ${this.codec.label} history to ${this.filePath}:`, error);
      this.removeTempFile(tempPath);
      return false;
    }
  }

  private ensureLoaded(): TRecord[] {
    if (!this.items) {
      this.items = this.loadFromDisk();
    }
    return this.items;
  }

  private indexOf(key: string): number {
    return this.ensureLoaded().findIndex((record) => this.codec.keyOf(record) === key);
  }

  private loadFromDisk(): TRecord[] {
    try {
      if (!fs.existsSync(this.filePath)) return [];
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));

      if (Array.isArray(parsed)) {
        return this.normalize(
          parsed
            .map((item: unknown) => this.codec.decode(item))
            .filter((item): item is TRecord => Boolean(item))
        );
      }

      const legacy = this.codec.decodeLegacy?.(parsed);
      if (legacy) {
        console.log(`[History] Migrating legacy ${this.codec.label} history from ${this.filePath}`);
        return this.normalize(legacy);
      }

      console.warn(`[History] Unrecognized ${this.codec.label} history format in ${this.filePath}, starting empty`);
      return [];
    } catch (error) {
      console.error(`[History] Failed to load ${this.codec.label} history from ${this.filePath}:`, error);
      return [];
    }
  }

  private normalize(records: TRecord[]): TRecord[] {
    const seen = new Set<string>();
    const unique: TRecord[] = [];
    for (const record of records) {
      const key = this.codec.keyOf(record);
      if (seen.has(key)) continue;
      seen.add(key);
      unique.push(record);
      if (unique.length >= this.maxItems) break;
    }
    return unique;
  }

  private removeTempFile(tempPath: string): void {
    try {
      fs.rmSync(tempPath, { force: true });
    } catch (error) {
      console.warn(`[History] Could not remove temp file ${tempPath}:`, error);
    }
  }
}
