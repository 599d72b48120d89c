/// <reference path="../global.d.ts" />
// Client boot: config, error hooks, controllers, stream bridge, carousel mount.
import { loadClientConfig } from '../core/config-state';
import type { ClientConfig } from '../core/config-types';
import { debugLog, errorLog } from '../env/logging';
import { wireCarousel, type CarouselWiring } from '../carousel/wire';
import { createOverlayController, type OverlayController } from '../hud/overlay-controller';
import { installSwapBridge } from '../swap/sse-bridge';
import { createTransitionDirector, type TransitionDirector } from '../swap/transition-director';

export const HTMX_LOAD = 'htmx:load';

export type ClientRuntime = {
  config: ClientConfig;
  overlay: OverlayController;
  director: TransitionDirector;
  getCarousel(): CarouselWiring | null;
  destroy(): void;
};

export interface StartClientOptions {
  doc?: Document;
  win?: Window;
  config?: ClientConfig;
}

const TAG = '[BOOT]';
const MAX_TRACE = 200;

export function bootPush(m: string, win: Window = window): void {
  const trace: Array<{ t: number; m: string }> = win.__VG_BOOT_TRACE ?? [];
  win.__VG_BOOT_TRACE = trace;
  trace.push({ t: Date.now(), m });
  if (trace.length > MAX_TRACE) trace.splice(0, trace.length - MAX_TRACE);
}

function describeError(value: unknown): string {
  if (value instanceof Error) return value.message;
  return String(value ?? '');
}

export function installErrorHooks(win: Window = window): () => void {
  const onError = (e: ErrorEvent) => {
    bootPush('onerror:' + describeError(e.error ?? e.message), win);
  };
  const onRejection = (e: PromiseRejectionEvent) => {
    bootPush('unhandled:' + describeError(e.reason), win);
    errorLog(TAG, 'unhandled rejection', e.reason);
  };
  win.addEventListener('error', onError);
  win.addEventListener('unhandledrejection', onRejection);
  return () => {
    win.removeEventListener('error', onError);
    win.removeEventListener('unhandledrejection', onRejection);
  };
}

export function domReady(callback: () => void, doc: Document = document): void {
  if (doc.readyState === 'interactive' || doc.readyState === 'complete') callback();
  else doc.addEventListener('DOMContentLoaded', callback, { once: true });
}

export function startClient(opts: StartClientOptions = {}): ClientRuntime {
  const doc = opts.doc ?? document;
  const win = opts.win ?? window;
  const config = opts.config ?? loadClientConfig(win);
  bootPush('boot-start', win);
  const removeErrorHooks = installErrorHooks(win);

  doc.body.style.visibility = 'visible';
  const session = doc.getElementById(config.sessionElementId);
  if (session) debugLog(TAG, `Session opened: ${session.textContent ?? ''}`);

  const overlay = createOverlayController({
    doc,
    overlaySelector: config.overlaySelector,
    fullScreenMediaId: config.fullScreenMediaId,
    focusGuardId: config.focusGuardId,
  });

  const director = createTransitionDirector({ overlay, styleRoot: doc.documentElement, defaultTransition: config.defaultTransition });
  director.init();

  const removeBridge = installSwapBridge({ root: doc.body, director, statusElementIds: config.statusElementIds });

  let carousel: CarouselWiring | null = null;
  const mountCarousel = () => {
    carousel?.destroy();
    carousel = wireCarousel({ doc, overlay, config });
  };
  mountCarousel();

  // Swapped-in content: let htmx process it, and re-wire when a carousel arrives
  // or the wired one was swapped out.
  const onLoad = (ev: Event) => {
    const elt = ev.target;
    if (!(elt instanceof Element)) return;
    try {
      win.htmx?.process(elt);
    } catch (err) {
      errorLog(TAG, 'htmx.process failed', err);
    }
    const bringsCarousel = elt.matches(config.carouselSelector) || !!elt.querySelector(config.carouselSelector);
    if (bringsCarousel || (carousel && !carousel.track.isConnected)) mountCarousel();
  };
  doc.body.addEventListener(HTMX_LOAD, onLoad);

  bootPush('boot-done', win);

  return {
    config,
    overlay,
    director,
    getCarousel: () => carousel,
    destroy: () => {
      doc.body.removeEventListener(HTMX_LOAD, onLoad);
      removeBridge();
      removeErrorHooks();
      carousel?.destroy();
      carousel = null;
      overlay.destroy();
    },
  };
}
