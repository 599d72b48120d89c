// src/swap/transition-director.ts
//
// Decides the transition for each streamed fragment and publishes it, together
// with the speech/utterance cadence, as custom properties on the document root.
// The animation layer (CSS) reads:
//   --swap-animation     transition name, `none`, or unset
//   --speech-period      `<N>s`
//   --utterance-period   `<N>s`

import { emit } from '../core/bus';
import { reportSkip } from '../core/skip';
import { debugLog, verboseLog } from '../env/logging';
import type { OverlaySink } from '../hud/overlay-controller';
import { parseUpdateHints, type HintSet, type PeriodKind } from './hint-parser';

export type StreamedUpdate = {
  target: Element | null;
  rawMarkup: string;
  targetSwapSpec: string | null;
  /** Status surfaces swap silently unless the fragment asks for a transition. */
  suppressesDefaultTransition: boolean;
};

export type TransitionState = {
  transitionName: string | null;
  speechPeriod: number | null;
  utterancePeriod: number | null;
};

export interface TransitionDirector {
  init(): void;
  apply(update: StreamedUpdate): void;
  getState(): TransitionState;
}

export interface TransitionDirectorOptions {
  overlay: Pick<OverlaySink, 'show' | 'hide'>;
  /** Where the style state is published; defaults to document.documentElement. */
  styleRoot?: HTMLElement;
  defaultTransition: string | null;
}

export const TRANSITION_EVENT = 'vg:transition';

export const STYLE_PROPS = {
  transition: '--swap-animation',
  speech: '--speech-period',
  utterance: '--utterance-period',
} as const;

const TAG = '[SWAP]';

function isNeutral(h: HintSet): boolean {
  return h.transitionName === null && h.periodHints.size === 0 && h.visibilityHint === null;
}

export function createTransitionDirector(opts: TransitionDirectorOptions): TransitionDirector {
  const root = opts.styleRoot ?? document.documentElement;
  let state: TransitionState = { transitionName: null, speechPeriod: null, utterancePeriod: null };

  const setTransition = (name: string) => {
    if (state.transitionName !== name) debugLog(TAG, `${STYLE_PROPS.transition} = ${name}`);
    root.style.setProperty(STYLE_PROPS.transition, name);
    state = { ...state, transitionName: name };
  };

  const clearTransition = () => {
    if (state.transitionName !== null) debugLog(TAG, `unset ${STYLE_PROPS.transition}`);
    root.style.removeProperty(STYLE_PROPS.transition);
    state = { ...state, transitionName: null };
  };

  const setPeriod = (kind: PeriodKind, seconds: number) => {
    root.style.setProperty(STYLE_PROPS[kind], `${seconds}s`);
    state = kind === 'speech'
      ? { ...state, speechPeriod: seconds }
      : { ...state, utterancePeriod: seconds };
    debugLog(TAG, `${STYLE_PROPS[kind]} = ${seconds}s`);
  };

  const init = () => {
    root.style.removeProperty(STYLE_PROPS.transition);
    root.style.removeProperty(STYLE_PROPS.speech);
    root.style.removeProperty(STYLE_PROPS.utterance);
    state = { transitionName: null, speechPeriod: null, utterancePeriod: null };
  };

  const apply = (update: StreamedUpdate) => {
    if (!update.target) {
      reportSkip(TAG, 'invalid-target');
      return;
    }
    const { hints, transitionEligible } = parseUpdateHints(update.rawMarkup, update.targetSwapSpec);
    if (isNeutral(hints)) reportSkip(TAG, 'parse-miss', { target: update.target.id });

    // Cadence and visibility are independent of the transition channel.
    hints.periodHints.forEach((seconds, kind) => setPeriod(kind, seconds));
    if (hints.visibilityHint === 'show') opts.overlay.show('status');
    else if (hints.visibilityHint === 'hide') opts.overlay.hide();

    if (!transitionEligible) {
      // leave whatever is animating for other content alone
      verboseLog(TAG, 'target not set for transition', { target: update.target.id });
    } else if (hints.transitionName) {
      setTransition(hints.transitionName);
    } else if (update.suppressesDefaultTransition) {
      setTransition('none');
    } else if (opts.defaultTransition) {
      setTransition(opts.defaultTransition);
    } else {
      clearTransition();
    }

    emit<TransitionState>(TRANSITION_EVENT, state);
  };

  return {
    init,
    apply,
    getState: () => ({ ...state }),
  };
}
