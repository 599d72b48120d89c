// Browser entry: bundled and loaded by the GUI page after htmx.
import { domReady, startClient } from './boot/boot';

export { startClient, domReady } from './boot/boot';
export type { ClientRuntime } from './boot/boot';
export * from './swap/hint-parser';
export * from './swap/transition-director';
export { createOverlayController } from './hud/overlay-controller';
export type { OverlayController, OverlayState, OverlaySink } from './hud/overlay-controller';
export { installSwapBridge, suppressesDefaultTransition } from './swap/sse-bridge';
export { loadClientConfig, saveClientConfig } from './core/config-state';
export { DEFAULT_CONFIG } from './core/config-types';
export type { ClientConfig } from './core/config-types';
export { on } from './core/bus';
export { wireCarousel } from './carousel/wire';
export type { CarouselWiring } from './carousel/wire';
export { createCarouselNavigator } from './carousel/navigator';
export type { CarouselNavigator, CarouselState, CarouselPhase } from './carousel/navigator';

if (typeof document !== 'undefined' && !document.documentElement.hasAttribute('data-vg-manual-boot')) {
  domReady(() => {
    startClient();
  });
}
