import { debugLog } from '../env/logging';
import { reportSkip } from '../core/skip';

export type OverlayShowReason = 'pointer' | 'keyboard' | 'scroll' | 'click' | 'status';

export type OverlayState = {
  visible: boolean;
  hidePending: boolean;
};

/** What other controllers are allowed to ask of the overlay. */
export interface OverlaySink {
  show(reason: OverlayShowReason): void;
  hide(): boolean;
  requestTimedHide(delayMs: number): void;
}

export interface OverlayController extends OverlaySink {
  cancelTimedHide(): void;
  getState(): OverlayState;
  destroy(): void;
}

export interface OverlayControllerOptions {
  doc?: Document;
  /** Tab strip / bottom bar containers. */
  overlaySelector: string;
  fullScreenMediaId: string;
  /** While this input holds focus, hide requests are ignored. */
  focusGuardId: string;
}

const TAG = '[OVERLAY]';

export function createOverlayController(opts: OverlayControllerOptions): OverlayController {
  const doc = opts.doc ?? document;
  let visible = false;
  let hideTimer: ReturnType<typeof setTimeout> | null = null;

  // Resolved per call: fragments swap these elements in and out.
  const containers = () => Array.from(doc.querySelectorAll<HTMLElement>(opts.overlaySelector));
  const media = () => doc.getElementById(opts.fullScreenMediaId);

  const cancelTimedHide = () => {
    if (hideTimer !== null) {
      clearTimeout(hideTimer);
      hideTimer = null;
    }
  };

  const show = (reason: OverlayShowReason) => {
    const els = containers();
    if (!els.length) {
      reportSkip(TAG, 'invalid-target', { op: 'show', reason });
      return;
    }
    cancelTimedHide();
    els.forEach((el) => {
      el.classList.remove('tabs-hidden');
      el.classList.add('tabs-shown');
    });
    media()?.classList.add('small');
    if (!visible) debugLog(TAG, 'show', { reason });
    visible = true;
  };

  const hide = (): boolean => {
    const guard = doc.getElementById(opts.focusGuardId);
    if (guard && doc.activeElement === guard) {
      debugLog(TAG, 'hide suppressed: input focused');
      return false;
    }
    const els = containers();
    if (!els.length) {
      reportSkip(TAG, 'invalid-target', { op: 'hide' });
      return false;
    }
    cancelTimedHide();
    els.forEach((el) => {
      el.classList.remove('tabs-shown');
      el.classList.add('tabs-hidden');
    });
    media()?.classList.remove('small');
    if (visible) debugLog(TAG, 'hide');
    visible = false;
    return true;
  };

  const requestTimedHide = (delayMs: number) => {
    cancelTimedHide();
    hideTimer = setTimeout(() => {
      hideTimer = null;
      hide();
    }, Math.max(0, delayMs));
  };

  return {
    show,
    hide,
    requestTimedHide,
    cancelTimedHide,
    getState: () => ({ visible, hidePending: hideTimer !== null }),
    destroy: cancelTimedHide,
  };
}
