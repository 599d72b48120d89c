/// <reference path="../global.d.ts" />
// src/env/logging.ts
// Central logging helpers with a CI quiet mode gate.

import { shouldLogLevel, shouldLogTag } from './dev-log';

export function isQuietEnv(): boolean {
  if (typeof window === 'undefined') return true;
  const env = window.__vgEnv;
  return !!(env && env.ci);
}

export function debugLog(tag: string, message: string, payload?: unknown): void {
  if (isQuietEnv() || !shouldLogLevel(1)) return;
  if (payload === undefined) console.log(tag, message);
  else console.log(tag, message, payload);
}

export function verboseLog(tag: string, message: string, payload?: unknown): void {
  if (isQuietEnv() || !shouldLogLevel(2)) return;
  console.debug(tag, message, payload);
}

/** Throttled per tag+message; for hot paths such as scroll samples. */
export function probeLog(tag: string, message: string, payload?: unknown, throttleMs = 500): void {
  if (isQuietEnv() || !shouldLogTag(`${tag} ${message}`, 2, throttleMs)) return;
  console.debug(tag, message, payload);
}

export function errorLog(tag: string, message: string, err: unknown): void {
  if (isQuietEnv()) return;
  console.error(tag, message, err);
}
