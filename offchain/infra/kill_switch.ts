import fs from 'fs';

const DEFAULT_INTERVAL_MS = 1_000;

export type KillSwitch = {
  isActive(options?: { force?: boolean }): boolean;
  path(): string | null;
};

/**
 * File-based pause switch: while the file exists, submissions are suppressed. The filesystem is
 * polled at most once per `pollIntervalMs`.
 */
export function createKillSwitch(
  filePath: string | undefined,
  pollIntervalMs = Number(process.env.KILL_SWITCH_POLL_MS ?? DEFAULT_INTERVAL_MS),
  now: () => number = Date.now,
): KillSwitch {
  const pathRaw = filePath?.trim();
  let lastState = false;
  let lastChecked: number | undefined;

  function refreshState(force: boolean): boolean {
    if (!pathRaw) return false;
    const ts = now();
    if (!force && lastChecked !== undefined && ts - lastChecked < pollIntervalMs) {
      return lastState;
    }
    lastChecked = ts;
    lastState = fs.existsSync(pathRaw);
    return lastState;
  }

  return {
    isActive: (options) => refreshState(options?.force ?? false),
    path: () => (pathRaw && pathRaw.length > 0 ? pathRaw : null),
  };
}
