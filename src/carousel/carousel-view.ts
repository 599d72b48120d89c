import type { Rgb } from '../core/config-types';
import { gradientAt } from './gradient';

/** DOM port of the navigator. Elements are re-queried per call; items can be swapped. */
export interface CarouselView {
  itemCount(): number;
  /** Left offset of item `index`, or null when it is not mounted. */
  itemOffset(index: number): number | null;
  scrollOffset(): number;
  /** Scrollable distance: content width minus visible width. */
  trackWidth(): number;
  scrollTo(offset: number): void;
  highlightTab(index: number): void;
  paintBackground(ratio: number): void;
}

export interface CarouselViewOptions {
  track: HTMLElement;
  /** Element holding the tabs; also receives the gradient when it is the background. */
  tabsRoot: ParentNode;
  background: HTMLElement | null;
  itemSelector: string;
  tabSelector: string;
  gradientStart: Rgb;
  gradientEnd: Rgb;
}

export const ACTIVE_TAB_CLASS = 'tab-active';

export function createCarouselView(opts: CarouselViewOptions): CarouselView {
  const { track, tabsRoot, background } = opts;
  const items = () => track.querySelectorAll<HTMLElement>(opts.itemSelector);

  return {
    itemCount: () => items().length,
    itemOffset: (index) => {
      const item = items()[index];
      return item ? item.offsetLeft : null;
    },
    scrollOffset: () => track.scrollLeft,
    trackWidth: () => track.scrollWidth - track.clientWidth,
    scrollTo: (offset) => {
      if (typeof track.scrollTo === 'function') track.scrollTo({ left: offset, behavior: 'smooth' });
      else track.scrollLeft = offset;
    },
    highlightTab: (index) => {
      tabsRoot.querySelectorAll<HTMLElement>(opts.tabSelector).forEach((tab, idx) => {
        const active = idx === index;
        tab.classList.toggle(ACTIVE_TAB_CLASS, active);
        tab.setAttribute('aria-selected', active ? 'true' : 'false');
      });
    },
    paintBackground: (ratio) => {
      if (!background) return;
      background.style.background = gradientAt(ratio, opts.gradientStart, opts.gradientEnd);
    },
  };
}
