import { createOverlayController } from '../../src/hud/overlay-controller';

const OPTS = {
  overlaySelector: '#bottom-container, #tabs-container',
  fullScreenMediaId: 'full-screen-image',
  focusGuardId: 'utterance-input',
};

describe('overlay controller', () => {
  let bar: HTMLElement;
  let tabs: HTMLElement;
  let media: HTMLElement;
  let input: HTMLInputElement;

  beforeEach(() => {
    jest.useFakeTimers();
    document.body.innerHTML = `
      <div id="bottom-container" class="tabs-hidden"><input id="utterance-input" /></div>
      <div id="tabs-container" class="tabs-hidden"></div>
      <div id="full-screen-image"></div>
    `;
    bar = document.getElementById('bottom-container') as HTMLElement;
    tabs = document.getElementById('tabs-container') as HTMLElement;
    media = document.getElementById('full-screen-image') as HTMLElement;
    input = document.getElementById('utterance-input') as HTMLInputElement;
  });

  test('show reveals every container and shrinks the media', () => {
    const overlay = createOverlayController(OPTS);
    overlay.show('pointer');
    for (const el of [bar, tabs]) {
      expect(el.classList.contains('tabs-shown')).toBe(true);
      expect(el.classList.contains('tabs-hidden')).toBe(false);
    }
    expect(media.classList.contains('small')).toBe(true);
    expect(overlay.getState()).toEqual({ visible: true, hidePending: false });
  });

  test('hide restores the media to full size', () => {
    const overlay = createOverlayController(OPTS);
    overlay.show('pointer');
    expect(overlay.hide()).toBe(true);
    expect(bar.className).toBe('tabs-hidden');
    expect(media.classList.contains('small')).toBe(false);
    expect(overlay.getState().visible).toBe(false);
  });

  test('hide is suppressed while the utterance input has focus', () => {
    const overlay = createOverlayController(OPTS);
    overlay.show('status');
    input.focus();
    expect(overlay.hide()).toBe(false);
    expect(overlay.getState().visible).toBe(true);
    input.blur();
    expect(overlay.hide()).toBe(true);
  });

  test('focus is checked when the timer fires, not when it is armed', () => {
    const overlay = createOverlayController(OPTS);
    overlay.show('pointer');
    overlay.requestTimedHide(2000);
    jest.advanceTimersByTime(1000);
    input.focus();
    jest.advanceTimersByTime(1000);
    expect(overlay.getState()).toEqual({ visible: true, hidePending: false });
  });

  test('re-arming keeps exactly one pending timer', () => {
    const overlay = createOverlayController(OPTS);
    overlay.show('keyboard');
    overlay.requestTimedHide(2000);
    jest.advanceTimersByTime(1500);
    overlay.requestTimedHide(2000);
    expect(jest.getTimerCount()).toBe(1);

    jest.advanceTimersByTime(1000);
    expect(overlay.getState().visible).toBe(true);
    jest.advanceTimersByTime(1000);
    expect(overlay.getState()).toEqual({ visible: false, hidePending: false });
  });

  test('show cancels a pending hide', () => {
    const overlay = createOverlayController(OPTS);
    overlay.show('pointer');
    overlay.requestTimedHide(100);
    overlay.show('status');
    jest.advanceTimersByTime(500);
    expect(overlay.getState()).toEqual({ visible: true, hidePending: false });
  });

  test('cancelTimedHide keeps the overlay up', () => {
    const overlay = createOverlayController(OPTS);
    overlay.show('keyboard');
    overlay.requestTimedHide(2000);
    overlay.cancelTimedHide();
    expect(overlay.getState()).toEqual({ visible: true, hidePending: false });
    expect(jest.getTimerCount()).toBe(0);
    jest.advanceTimersByTime(5000);
    expect(bar.classList.contains('tabs-shown')).toBe(true);
    expect(overlay.getState().visible).toBe(true);
  });

  test('nothing happens while no overlay container is mounted', () => {
    document.body.innerHTML = '<div id="full-screen-image"></div>';
    const overlay = createOverlayController(OPTS);
    overlay.show('status');
    expect(overlay.getState().visible).toBe(false);
    expect(document.getElementById('full-screen-image')?.classList.contains('small')).toBe(false);
  });

  test('destroy drops the pending timer', () => {
    const overlay = createOverlayController(OPTS);
    overlay.show('pointer');
    overlay.requestTimedHide(100);
    overlay.destroy();
    expect(jest.getTimerCount()).toBe(0);
  });
});
