/**
 * App Catalog
 *
 * Contract with the platform layer that discovers and focuses applications,
 * plus the ordering used when the launcher's input is matched against them.
 */

export interface AppEntry {
  /** Stable identifier (bundle id, desktop file id or path). */
  identifier: string;
  displayName: string;
  isRunning: boolean;
}

export interface AppFocusCollaborator {
  listApps(): AppEntry[] | Promise<AppEntry[]>;
  activateOrLaunch(identifier: string): boolean | Promise<boolean>;
}

export type RecencyLookup = (identifier: string) => number;

export type AppMatcher = (apps: AppEntry[], text: string, recencyOf: RecencyLookup) => AppEntry | null;

const byName = (a: AppEntry, b: AppEntry) =>
  a.displayName.toLowerCase().localeCompare(b.displayName.toLowerCase());

export function getAppSuggestions(apps: AppEntry[], filterText: string, recencyOf: RecencyLookup): AppEntry[] {
  const runningNames = new Set(
    apps.filter((app) => app.isRunning).map((app) => app.displayName.toLowerCase())
  );

  const seenNames = new Set<string>();
  const unique: AppEntry[] = [];
  for (const app of apps) {
    const name = app.displayName.trim().toLowerCase();
    if (!name || !app.identifier) continue;
    if (!app.isRunning && runningNames.has(name)) continue;
    if (seenNames.has(name)) continue;
    seenNames.add(name);
    unique.push(app);
  }

  const filter = String(filterText || '').trim().toLowerCase();
  const filtered = filter
    ? unique.filter((app) => app.displayName.toLowerCase().includes(filter))
    : unique;

  const running = filtered
    .filter((app) => app.isRunning)
    .sort((a, b) => {
      const recencyDelta = recencyOf(a.identifier) - recencyOf(b.identifier);
      // Two unknown apps both rank at Infinity; Infinity - Infinity is NaN.
      if (recencyDelta !== 0 && !Number.isNaN(recencyDelta)) return recencyDelta;
      return byName(a, b);
    });
  const others = filtered.filter((app) => !app.isRunning).sort(byName);

  return [...running, ...others];
}

export const findAppMatch: AppMatcher = (apps, text, recencyOf) => {
  if (!String(text || '').trim()) return null;
  return getAppSuggestions(apps, text, recencyOf)[0] || null;
};
