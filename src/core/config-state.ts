/// <reference path="../global.d.ts" />
// src/core/config-state.ts
import { CONFIG_VERSION, DEFAULT_CONFIG, type ClientConfig, clampConfig, parseEnvelope } from './config-types';
import { debugLog } from '../env/logging';

export const CONFIG_STORAGE_KEY = 'vg_config';

function readStored(): string | null {
  try {
    return localStorage.getItem(CONFIG_STORAGE_KEY);
  } catch {
    // storage can be blocked (privacy mode, sandboxed iframe)
    return null;
  }
}

/**
 * Resolve the effective configuration.
 * Priority (low → high): defaults → window.__vgConfig → localStorage envelope.
 * An envelope with a different version is ignored.
 */
export function loadClientConfig(win: Window = window): ClientConfig {
  let cfg = clampConfig(win.__vgConfig, DEFAULT_CONFIG);
  const env = parseEnvelope(readStored());
  if (env && env.v === CONFIG_VERSION) {
    cfg = clampConfig(env.data, cfg);
  } else if (env) {
    debugLog('[CONFIG]', 'ignoring stored config with version', env.v);
  }
  return cfg;
}

export function saveClientConfig(overrides: Partial<ClientConfig>): void {
  try {
    localStorage.setItem(CONFIG_STORAGE_KEY, JSON.stringify({ v: CONFIG_VERSION, data: overrides }));
  } catch (err) {
    debugLog('[CONFIG]', 'persist failed', err);
  }
}
