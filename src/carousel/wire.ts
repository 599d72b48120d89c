// Carousel input wiring: pointer, keyboard, scroll and tab clicks.
// Pointer and keyboard each have their own debouncer.

import type { ClientConfig } from '../core/config-types';
import { debugLog, errorLog } from '../env/logging';
import type { OverlaySink } from '../hud/overlay-controller';
import { debounce } from '../utils/debounce';
import { createCarouselView } from './carousel-view';
import { createCarouselNavigator, type CarouselNavigator, type NavDirection } from './navigator';

export type CarouselWiring = {
  navigator: CarouselNavigator;
  track: HTMLElement;
  destroy(): void;
};

type CarouselWiringConfig = Pick<
  ClientConfig,
  | 'inactivityTimeoutMs'
  | 'pointerDebounceMs'
  | 'keyDebounceMs'
  | 'navigationSettleMs'
  | 'scrollSettleMs'
  | 'gradientStart'
  | 'gradientEnd'
  | 'carouselSelector'
  | 'carouselBackgroundId'
  | 'itemSelector'
  | 'tabSelector'
>;

export interface WireCarouselOptions {
  doc?: Document;
  overlay: OverlaySink;
  config: CarouselWiringConfig;
}

const TAG = '[CAROUSEL]';

const KEY_DIRECTIONS: Partial<Record<string, NavDirection>> = {
  ArrowRight: 'next',
  ArrowLeft: 'prev',
};

function isTypingElement(target: EventTarget | null): boolean {
  if (!(target instanceof HTMLElement)) return false;
  if (target.isContentEditable) return true;
  const tag = target.tagName.toLowerCase();
  return tag === 'input' || tag === 'textarea' || tag === 'select';
}

function guarded<E extends Event>(label: string, fn: (ev: E) => void): (ev: E) => void {
  return (ev) => {
    try {
      fn(ev);
    } catch (err) {
      errorLog(TAG, `${label} handler failed`, err);
    }
  };
}

/** Wire the carousel found in `doc`; null when the page has none. */
export function wireCarousel(opts: WireCarouselOptions): CarouselWiring | null {
  const doc = opts.doc ?? document;
  const { config, overlay } = opts;
  const track = doc.querySelector<HTMLElement>(config.carouselSelector);
  if (!track) return null;

  const background = doc.getElementById(config.carouselBackgroundId);
  // The background wraps both the track and the tab strip in the home screen layout.
  const region: HTMLElement = background ?? track;

  const view = createCarouselView({
    track,
    tabsRoot: region,
    background,
    itemSelector: config.itemSelector,
    tabSelector: config.tabSelector,
    gradientStart: config.gradientStart,
    gradientEnd: config.gradientEnd,
  });
  const navigator = createCarouselNavigator({
    view,
    overlay,
    inactivityTimeoutMs: config.inactivityTimeoutMs,
    navigationSettleMs: config.navigationSettleMs,
    scrollSettleMs: config.scrollSettleMs,
  });

  const pointer = debounce((action: 'enter' | 'leave') => {
    if (action === 'enter') {
      overlay.show('pointer');
      overlay.requestTimedHide(config.inactivityTimeoutMs);
    } else {
      overlay.hide();
    }
  }, config.pointerDebounceMs);

  const keys = debounce((direction: NavDirection) => {
    navigator.onKey(direction);
  }, config.keyDebounceMs);

  const onPointerEnter = guarded('pointerenter', () => pointer('enter'));
  const onPointerLeave = guarded('pointerleave', () => pointer('leave'));

  const onKeyUp = guarded('keyup', (ev: KeyboardEvent) => {
    const direction = KEY_DIRECTIONS[ev.key];
    if (!direction || isTypingElement(ev.target)) return;
    ev.preventDefault();
    keys(direction);
  });

  const onScroll = guarded('scroll', () => navigator.onScroll());
  const onScrollEnd = guarded('scrollend', () => navigator.onScrollEnd());

  const onClick = guarded('click', (ev: MouseEvent) => {
    if (!(ev.target instanceof Element)) return;
    const tab = ev.target.closest(config.tabSelector);
    if (!tab || !region.contains(tab)) return;
    ev.preventDefault();
    const tabs = Array.from(region.querySelectorAll(config.tabSelector));
    navigator.onTabClick(tabs.indexOf(tab));
  });

  region.addEventListener('pointerenter', onPointerEnter);
  region.addEventListener('pointerleave', onPointerLeave);
  region.addEventListener('click', onClick);
  doc.addEventListener('keyup', onKeyUp);
  track.addEventListener('scroll', onScroll, { passive: true });
  track.addEventListener('scrollend', onScrollEnd);

  navigator.sync();
  debugLog(TAG, 'wired', { items: navigator.getState().itemCount });

  const destroy = () => {
    region.removeEventListener('pointerenter', onPointerEnter);
    region.removeEventListener('pointerleave', onPointerLeave);
    region.removeEventListener('click', onClick);
    doc.removeEventListener('keyup', onKeyUp);
    track.removeEventListener('scroll', onScroll);
    track.removeEventListener('scrollend', onScrollEnd);
    pointer.cancel();
    keys.cancel();
    navigator.destroy();
  };

  return { navigator, track, destroy };
}
