/// <reference path="../global.d.ts" />
// Console log level for the client.
//   0 silent, 1 state changes and errors, 2 skips and scroll probes, 3 trace
// The first source holding a number wins: window.__vgLogLevel, then
// localStorage vg_log_level, then ?vg_log_level= or ?log=. Without one, dev pages
// (__VG_DEV, ?dev, ?debug, vg_dev_mode=1) log at 1 and everything else at 0.

export type LogLevel = 0 | 1 | 2 | 3;

const probeSeenAt = new Map<string, number>();

function toLevel(value: unknown): LogLevel | null {
  if (value === null || value === undefined || value === '') return null;
  const n = Math.floor(Number(value));
  if (Number.isNaN(n)) return null;
  if (n >= 3) return 3;
  if (n === 2) return 2;
  if (n === 1) return 1;
  return 0;
}

function storedItem(key: string): string | null {
  try {
    return window.localStorage?.getItem(key) ?? null;
  } catch {
    // blocked storage (privacy mode, sandboxed iframe) reads as unset
    return null;
  }
}

function isDevPage(query: URLSearchParams): boolean {
  return !!window.__VG_DEV || query.has('dev') || query.has('debug') || storedItem('vg_dev_mode') === '1';
}

export function getLogLevel(): LogLevel {
  if (typeof window === 'undefined') return 0;
  const query = new URLSearchParams(window.location.search || '');
  const sources: Array<() => unknown> = [
    () => window.__vgLogLevel,
    () => storedItem('vg_log_level'),
    () => query.get('vg_log_level'),
    () => query.get('log'),
  ];
  for (const read of sources) {
    const level = toLevel(read());
    if (level !== null) return level;
  }
  return isDevPage(query) ? 1 : 0;
}

export function shouldLogLevel(min: LogLevel): boolean {
  return getLogLevel() >= min;
}

/** Level gate plus a per-key quiet window, for hot paths. */
export function shouldLogTag(key: string, min: LogLevel = 2, throttleMs = 500): boolean {
  if (!shouldLogLevel(min)) return false;
  if (!key || throttleMs <= 0) return true;
  const now = Date.now();
  const last = probeSeenAt.get(key);
  if (last !== undefined && now - last < throttleMs) return false;
  probeSeenAt.set(key, now);
  return true;
}

export function resetLogThrottle(): void {
  probeSeenAt.clear();
}
