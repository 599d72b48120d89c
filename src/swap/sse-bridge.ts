import { errorLog } from '../env/logging';
import { reportSkip } from '../core/skip';
import type { StreamedUpdate, TransitionDirector } from './transition-director';

/** Fired by the htmx SSE extension before a message is swapped into its target. */
export const SSE_BEFORE_MESSAGE = 'htmx:sseBeforeMessage';

export const SUPPRESS_DEFAULT_ATTR = 'data-suppress-default-transition';

const TAG = '[SWAP]';

/**
 * The producer can flag a target explicitly; `data-suppress-default-transition="false"`
 * opts a status-named element back in. Unflagged targets fall back to the id list.
 */
export function suppressesDefaultTransition(target: Element, statusElementIds: readonly string[]): boolean {
  const flag = target.getAttribute(SUPPRESS_DEFAULT_ATTR);
  if (flag !== null) return flag !== 'false';
  return !!target.id && statusElementIds.includes(target.id);
}

export function toStreamedUpdate(ev: Event, statusElementIds: readonly string[]): StreamedUpdate {
  const target = ev.target instanceof Element ? ev.target : null;
  let rawMarkup = '';
  if (ev instanceof CustomEvent && ev.detail && typeof ev.detail.data === 'string') {
    rawMarkup = ev.detail.data;
  }
  return {
    target,
    rawMarkup,
    targetSwapSpec: target ? target.getAttribute('hx-swap') : null,
    suppressesDefaultTransition: target ? suppressesDefaultTransition(target, statusElementIds) : false,
  };
}

export interface SwapBridgeOptions {
  root?: EventTarget;
  director: TransitionDirector;
  statusElementIds: readonly string[];
}

export function installSwapBridge(opts: SwapBridgeOptions): () => void {
  const root = opts.root ?? document.body;
  const onMessage = (ev: Event) => {
    const update = toStreamedUpdate(ev, opts.statusElementIds);
    if (!update.target) {
      reportSkip(TAG, 'invalid-target', { type: ev.type });
      return;
    }
    try {
      opts.director.apply(update);
    } catch (err) {
      // one bad fragment must not stop the stream
      errorLog(TAG, 'apply failed', err);
    }
  };
  root.addEventListener(SSE_BEFORE_MESSAGE, onMessage);
  return () => root.removeEventListener(SSE_BEFORE_MESSAGE, onMessage);
}
