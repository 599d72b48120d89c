// src/carousel/navigator.ts
//
// Keeps selected index, scroll offset, tab highlight and background in step.
//
//   idle ──scroll──▶ scroll-syncing ──(no samples for scrollSettleMs)──▶ idle
//   idle / scroll-syncing ──key / tab click──▶ programmatic ──(scrollend | settle delay)──▶ idle
//
// While programmatic, keyboard requests are dropped (not queued). Scroll samples
// still move the index (the phase stays programmatic) and tab clicks are always taken.
//
// The browser's smooth scroll is fire-and-forget. Completion comes from
// `scrollend` where the platform fires it; otherwise the fixed settle delay is
// an approximation that can be off under slow rendering or reduced motion.

import { reportSkip } from '../core/skip';
import { debugLog, probeLog, verboseLog } from '../env/logging';
import type { OverlaySink } from '../hud/overlay-controller';
import type { CarouselView } from './carousel-view';

export type CarouselPhase = 'idle' | 'scroll-syncing' | 'programmatic';

export type NavDirection = 'next' | 'prev';

export type CarouselState = {
  selectedIndex: number;
  itemCount: number;
  navigationInFlight: boolean;
  phase: CarouselPhase;
};

export interface CarouselNavigator {
  onScroll(): void;
  onScrollEnd(): void;
  /** False when the request was dropped or had nowhere to go. */
  onKey(direction: NavDirection): boolean;
  onTabClick(index: number): boolean;
  /** Paint from the current offset without revealing the overlay. */
  sync(): void;
  getState(): CarouselState;
  destroy(): void;
}

export interface CarouselNavigatorOptions {
  view: CarouselView;
  overlay: OverlaySink;
  inactivityTimeoutMs: number;
  navigationSettleMs: number;
  scrollSettleMs: number;
}

const TAG = '[CAROUSEL]';

const clamp = (n: number, min: number, max: number) => Math.min(max, Math.max(min, n));

export function createCarouselNavigator(opts: CarouselNavigatorOptions): CarouselNavigator {
  const { view, overlay } = opts;
  let selectedIndex = 0;
  let phase: CarouselPhase = 'idle';
  let settleTimer: ReturnType<typeof setTimeout> | null = null;
  let scrollIdleTimer: ReturnType<typeof setTimeout> | null = null;

  const clearSettle = () => {
    if (settleTimer !== null) clearTimeout(settleTimer);
    settleTimer = null;
  };

  const clearScrollIdle = () => {
    if (scrollIdleTimer !== null) clearTimeout(scrollIdleTimer);
    scrollIdleTimer = null;
  };

  // Items can be swapped out under us; keep the index inside the current range.
  const itemCount = (): number => {
    const n = view.itemCount();
    if (n >= 1 && selectedIndex > n - 1) selectedIndex = n - 1;
    return n;
  };

  const scrollRatio = (): number => {
    const width = view.trackWidth();
    if (width <= 0) return 0;
    const ratio = view.scrollOffset() / width;
    return Number.isFinite(ratio) ? clamp(ratio, 0, 1) : 0;
  };

  const indexFromOffset = (n: number): number => {
    const width = view.trackWidth();
    if (width <= 0) return 0;
    const idx = Math.floor(view.scrollOffset() / (width / n));
    return Number.isFinite(idx) ? clamp(idx, 0, n - 1) : 0;
  };

  const revealChrome = (reason: 'scroll' | 'keyboard' | 'click') => {
    overlay.show(reason);
    overlay.requestTimedHide(opts.inactivityTimeoutMs);
  };

  const settle = () => {
    clearSettle();
    if (phase === 'programmatic') {
      phase = 'idle';
      verboseLog(TAG, 'navigation settled', { selectedIndex });
    }
  };

  const navigateTo = (index: number, source: 'keyboard' | 'click'): boolean => {
    const offset = view.itemOffset(index);
    if (offset === null) {
      reportSkip(TAG, 'invalid-target', { index, source });
      return false;
    }
    clearScrollIdle();
    phase = 'programmatic';
    selectedIndex = index;
    view.highlightTab(index);
    view.scrollTo(offset);
    clearSettle();
    settleTimer = setTimeout(settle, opts.navigationSettleMs);
    debugLog(TAG, 'navigate', { index, source });
    return true;
  };

  const onScroll = () => {
    const n = itemCount();
    if (n < 1) {
      reportSkip(TAG, 'invalid-target', { op: 'scroll' });
      return;
    }
    selectedIndex = indexFromOffset(n);
    view.highlightTab(selectedIndex);
    if (phase !== 'programmatic') {
      phase = 'scroll-syncing';
      clearScrollIdle();
      scrollIdleTimer = setTimeout(() => {
        scrollIdleTimer = null;
        if (phase === 'scroll-syncing') phase = 'idle';
      }, opts.scrollSettleMs);
    }
    view.paintBackground(scrollRatio());
    probeLog(TAG, 'scroll sample', { offset: view.scrollOffset(), selectedIndex, phase });
    revealChrome('scroll');
  };

  const onScrollEnd = () => {
    if (phase === 'programmatic') {
      settle();
    } else if (phase === 'scroll-syncing') {
      clearScrollIdle();
      phase = 'idle';
    }
  };

  const onKey = (direction: NavDirection): boolean => {
    if (phase === 'programmatic') {
      verboseLog(TAG, 'key dropped: navigation in flight', { direction });
      return false;
    }
    const n = itemCount();
    if (n < 1) {
      reportSkip(TAG, 'invalid-target', { op: 'key' });
      return false;
    }
    revealChrome('keyboard');
    const next = clamp(selectedIndex + (direction === 'next' ? 1 : -1), 0, n - 1);
    if (next === selectedIndex) {
      reportSkip(TAG, 'out-of-range', { direction, selectedIndex });
      return false;
    }
    return navigateTo(next, 'keyboard');
  };

  const onTabClick = (index: number): boolean => {
    const n = itemCount();
    if (!Number.isInteger(index) || index < 0 || index >= n) {
      reportSkip(TAG, 'out-of-range', { index, itemCount: n });
      return false;
    }
    const ok = navigateTo(index, 'click');
    if (ok) revealChrome('click');
    return ok;
  };

  const sync = () => {
    const n = itemCount();
    if (n < 1) {
      reportSkip(TAG, 'invalid-target', { op: 'sync' });
      return;
    }
    selectedIndex = indexFromOffset(n);
    view.highlightTab(selectedIndex);
    view.paintBackground(scrollRatio());
  };

  const getState = (): CarouselState => {
    const n = itemCount();
    return {
      selectedIndex,
      itemCount: n,
      navigationInFlight: phase === 'programmatic',
      phase,
    };
  };

  const destroy = () => {
    clearSettle();
    clearScrollIdle();
    phase = 'idle';
  };

  return { onScroll, onScrollEnd, onKey, onTabClick, sync, getState, destroy };
}
