import { on } from '../../src/core/bus';
import {
  STYLE_PROPS,
  TRANSITION_EVENT,
  createTransitionDirector,
  type StreamedUpdate,
  type TransitionState,
} from '../../src/swap/transition-director';

const ELIGIBLE = 'innerHTML transition:true';

function makeUpdate(
  classes: string | null,
  opts: { swap?: string | null; id?: string; suppress?: boolean } = {},
): StreamedUpdate {
  const target = document.createElement('div');
  if (opts.id) target.id = opts.id;
  return {
    target,
    rawMarkup: classes === null ? '<div>hi</div>' : `<div class="${classes}">hi</div>`,
    targetSwapSpec: opts.swap === undefined ? ELIGIBLE : opts.swap,
    suppressesDefaultTransition: !!opts.suppress,
  };
}

function setup(defaultTransition: string | null = 'fade-in') {
  const root = document.createElement('div');
  const overlay = { show: jest.fn(), hide: jest.fn(() => true) };
  const director = createTransitionDirector({ overlay, styleRoot: root, defaultTransition });
  director.init();
  return { root, overlay, director };
}

describe('transition director', () => {
  test('hinted fragment on an eligible target sets transition, cadence and shows the overlay', () => {
    const { root, overlay, director } = setup();
    director.apply(makeUpdate('fade-in-from-left speech-period-3', { id: 'weather' }));

    expect(director.getState()).toEqual({ transitionName: 'fade-in-from-left', speechPeriod: 3, utterancePeriod: null });
    expect(root.style.getPropertyValue(STYLE_PROPS.transition)).toBe('fade-in-from-left');
    expect(root.style.getPropertyValue(STYLE_PROPS.speech)).toBe('3s');
    expect(overlay.show).toHaveBeenCalledWith('status');
    expect(overlay.hide).not.toHaveBeenCalled();
  });

  test('status targets without an explicit class swap with no transition', () => {
    const { root, director } = setup();
    director.apply(makeUpdate('swipe-in-from-left'));
    director.apply(makeUpdate(null, { id: 'speech', suppress: true }));
    expect(director.getState().transitionName).toBe('none');
    director.apply(makeUpdate('text-lg', { id: 'utterance', suppress: true }));
    director.apply(makeUpdate(null, { id: 'spinner', suppress: true }));
    expect(director.getState().transitionName).toBe('none');
    expect(root.style.getPropertyValue(STYLE_PROPS.transition)).toBe('none');
  });

  test('an explicit class still overrides on a status target', () => {
    const { director } = setup();
    director.apply(makeUpdate('fade-in-slow', { id: 'speech', suppress: true }));
    expect(director.getState().transitionName).toBe('fade-in-slow');
  });

  test('targets that did not opt in leave the running transition alone', () => {
    const { root, director } = setup();
    director.apply(makeUpdate('fade-in-from-top'));
    director.apply(makeUpdate('swipe-in-from-right', { swap: 'innerHTML' }));
    director.apply(makeUpdate('swipe-in-from-right', { swap: 'innerHTML transition:false' }));
    director.apply(makeUpdate('swipe-in-from-right', { swap: null }));
    expect(director.getState().transitionName).toBe('fade-in-from-top');
    expect(root.style.getPropertyValue(STYLE_PROPS.transition)).toBe('fade-in-from-top');
  });

  test('ineligible targets still carry cadence and visibility', () => {
    const { root, overlay, director } = setup();
    director.apply(makeUpdate('utterance-period-4 no-text', { swap: 'innerHTML' }));
    expect(director.getState()).toEqual({ transitionName: null, speechPeriod: null, utterancePeriod: 4 });
    expect(root.style.getPropertyValue(STYLE_PROPS.utterance)).toBe('4s');
    expect(overlay.hide).toHaveBeenCalledTimes(1);
    expect(overlay.show).not.toHaveBeenCalled();
  });

  test('unhinted eligible fragments fall back to the sticky fade-in baseline', () => {
    const { director } = setup();
    director.apply(makeUpdate('swipe-in-from-bottom'));
    director.apply(makeUpdate(null));
    expect(director.getState().transitionName).toBe('fade-in');
    director.apply(makeUpdate('text-lg'));
    expect(director.getState().transitionName).toBe('fade-in');
  });

  test('without a baseline, unhinted fragments clear the transition', () => {
    const { root, director } = setup(null);
    director.apply(makeUpdate('swipe-in-from-bottom'));
    director.apply(makeUpdate(null));
    expect(director.getState().transitionName).toBeNull();
    expect(root.style.getPropertyValue(STYLE_PROPS.transition)).toBe('');
  });

  test('periods persist until the same kind brings a new value', () => {
    const { director } = setup();
    director.apply(makeUpdate('speech-period-3'));
    director.apply(makeUpdate('utterance-period-6'));
    director.apply(makeUpdate(null));
    expect(director.getState()).toMatchObject({ speechPeriod: 3, utterancePeriod: 6 });
    director.apply(makeUpdate('speech-period-1'));
    expect(director.getState()).toMatchObject({ speechPeriod: 1, utterancePeriod: 6 });
  });

  test('an update without a target changes nothing', () => {
    const { overlay, director } = setup();
    director.apply(makeUpdate('fade-in-from-left'));
    director.apply({ ...makeUpdate('swipe-in-from-right speech-period-9'), target: null });
    expect(director.getState()).toEqual({ transitionName: 'fade-in-from-left', speechPeriod: null, utterancePeriod: null });
    expect(overlay.show).not.toHaveBeenCalled();
  });

  test('init clears published state', () => {
    const { root, director } = setup();
    director.apply(makeUpdate('fade-in-from-left speech-period-3'));
    director.init();
    expect(director.getState()).toEqual({ transitionName: null, speechPeriod: null, utterancePeriod: null });
    expect(root.style.getPropertyValue(STYLE_PROPS.transition)).toBe('');
    expect(root.style.getPropertyValue(STYLE_PROPS.speech)).toBe('');
  });

  test('each applied update is announced on the bus', () => {
    const { director } = setup();
    const seen: TransitionState[] = [];
    const off = on<TransitionState>(TRANSITION_EVENT, (s) => seen.push(s));
    director.apply(makeUpdate('swipe-in-from-left'));
    off();
    director.apply(makeUpdate(null));
    expect(seen).toEqual([{ transitionName: 'swipe-in-from-left', speechPeriod: null, utterancePeriod: null }]);
  });
});
