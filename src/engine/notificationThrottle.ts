export const DEFAULT_NOTIFY_INTERVAL_MS = 1000;

export function shouldRefresh(now: number, lastNotifyAt: number, minIntervalMs = DEFAULT_NOTIFY_INTERVAL_MS): boolean {
  return now - lastNotifyAt >= minIntervalMs;
}
