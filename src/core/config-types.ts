// src/core/config-types.ts
// Client configuration schema + clamping helpers.

export type Rgb = readonly [number, number, number];

export type ClientConfig = {
  inactivityTimeoutMs: number;
  pointerDebounceMs: number;
  keyDebounceMs: number;
  navigationSettleMs: number;
  scrollSettleMs: number;
  /** Baseline transition for eligible unhinted swaps; null clears instead. */
  defaultTransition: string | null;
  /** Fallback for targets that do not carry data-suppress-default-transition. */
  statusElementIds: string[];
  gradientStart: Rgb;
  gradientEnd: Rgb;
  overlaySelector: string;
  fullScreenMediaId: string;
  focusGuardId: string;
  carouselSelector: string;
  carouselBackgroundId: string;
  itemSelector: string;
  tabSelector: string;
  sessionElementId: string;
};

export const CONFIG_VERSION = 1;

export type ConfigEnvelope = { v: number; data: Record<string, unknown> };

export const DEFAULT_CONFIG: ClientConfig = {
  inactivityTimeoutMs: 2000,
  pointerDebounceMs: 10,
  keyDebounceMs: 25,
  navigationSettleMs: 500,
  scrollSettleMs: 150,
  defaultTransition: 'fade-in',
  statusElementIds: ['speech', 'utterance', 'spinner'],
  gradientStart: [59, 130, 246],
  gradientEnd: [255, 182, 193],
  overlaySelector: '#bottom-container, #tabs-container',
  fullScreenMediaId: 'full-screen-image',
  focusGuardId: 'utterance-input',
  carouselSelector: '.carousel',
  carouselBackgroundId: 'carousel-bg',
  itemSelector: '.carousel-item',
  tabSelector: '.tab',
  sessionElementId: 'session-id',
};

const MAX_DELAY_MS = 60_000;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function clampMs(v: unknown, fallback: number): number {
  if (typeof v !== 'number' || !Number.isFinite(v)) return fallback;
  return Math.max(0, Math.min(MAX_DELAY_MS, Math.round(v)));
}

function pickString(v: unknown, fallback: string): string {
  return typeof v === 'string' && v.trim() ? v.trim() : fallback;
}

function pickRgb(v: unknown, fallback: Rgb): Rgb {
  if (!Array.isArray(v) || v.length !== 3) return fallback;
  const out: number[] = [];
  for (const c of v) {
    if (typeof c !== 'number' || !Number.isFinite(c)) return fallback;
    out.push(Math.max(0, Math.min(255, Math.round(c))));
  }
  return [out[0], out[1], out[2]];
}

function pickIds(v: unknown, fallback: string[]): string[] {
  if (!Array.isArray(v)) return fallback;
  return v.filter((id): id is string => typeof id === 'string' && id.length > 0);
}

function pickTransition(v: unknown, fallback: string | null): string | null {
  if (v === null) return null;
  return typeof v === 'string' && v.trim() ? v.trim() : fallback;
}

/** Validate an untrusted override object against `base`; unknown keys are dropped. */
export function clampConfig(raw: unknown, base: ClientConfig = DEFAULT_CONFIG): ClientConfig {
  if (!isRecord(raw)) return { ...base };
  return {
    inactivityTimeoutMs: clampMs(raw.inactivityTimeoutMs, base.inactivityTimeoutMs),
    pointerDebounceMs: clampMs(raw.pointerDebounceMs, base.pointerDebounceMs),
    keyDebounceMs: clampMs(raw.keyDebounceMs, base.keyDebounceMs),
    navigationSettleMs: clampMs(raw.navigationSettleMs, base.navigationSettleMs),
    scrollSettleMs: clampMs(raw.scrollSettleMs, base.scrollSettleMs),
    defaultTransition: pickTransition(raw.defaultTransition, base.defaultTransition),
    statusElementIds: pickIds(raw.statusElementIds, base.statusElementIds),
    gradientStart: pickRgb(raw.gradientStart, base.gradientStart),
    gradientEnd: pickRgb(raw.gradientEnd, base.gradientEnd),
    overlaySelector: pickString(raw.overlaySelector, base.overlaySelector),
    fullScreenMediaId: pickString(raw.fullScreenMediaId, base.fullScreenMediaId),
    focusGuardId: pickString(raw.focusGuardId, base.focusGuardId),
    carouselSelector: pickString(raw.carouselSelector, base.carouselSelector),
    carouselBackgroundId: pickString(raw.carouselBackgroundId, base.carouselBackgroundId),
    itemSelector: pickString(raw.itemSelector, base.itemSelector),
    tabSelector: pickString(raw.tabSelector, base.tabSelector),
    sessionElementId: pickString(raw.sessionElementId, base.sessionElementId),
  };
}

export function parseEnvelope(json: string | null): ConfigEnvelope | null {
  if (!json) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || typeof parsed.v !== 'number' || !isRecord(parsed.data)) return null;
  return { v: parsed.v, data: parsed.data };
}
