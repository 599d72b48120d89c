// src/swap/hint-parser.ts
//
// Reads presentation hints from a streamed fragment. Only the root element's
// start tag is scanned; nested markup is never visited. Nothing here throws:
// malformed input yields the neutral hint set.

export type PeriodKind = 'speech' | 'utterance';
export type VisibilityHint = 'show' | 'hide';

export type HintSet = {
  transitionName: string | null;
  /** Seconds per kind. */
  periodHints: Map<PeriodKind, number>;
  visibilityHint: VisibilityHint | null;
};

export type ParsedUpdate = {
  hints: HintSet;
  transitionEligible: boolean;
};

const TRANSITION_MARKERS = ['fade-in', 'swipe-in'] as const;

const PERIOD_PREFIXES: ReadonlyArray<readonly [PeriodKind, string]> = [
  ['speech', 'speech-period-'],
  ['utterance', 'utterance-period-'],
];

const HIDE_TOKEN = 'no-text';

export function neutralHintSet(): HintSet {
  return { transitionName: null, periodHints: new Map(), visibilityHint: null };
}

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\n' || ch === '\t' || ch === '\r' || ch === '\f';
}

function isAsciiLetter(ch: string | undefined): boolean {
  if (!ch) return false;
  const c = ch.charCodeAt(0);
  return (c >= 65 && c <= 90) || (c >= 97 && c <= 122);
}

function isDigits(s: string): boolean {
  if (!s.length) return false;
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    if (c < 48 || c > 57) return false;
  }
  return true;
}

// Index of the root element's '<', skipping whitespace, comments, doctype and
// processing instructions. -1 when the fragment does not open with an element.
function findRootTag(s: string): number {
  let i = 0;
  while (i < s.length) {
    if (isSpace(s[i])) { i++; continue; }
    if (s[i] !== '<') return -1;
    if (s.startsWith('<!--', i)) {
      const end = s.indexOf('-->', i + 4);
      if (end < 0) return -1;
      i = end + 3;
      continue;
    }
    if (s.startsWith('<!', i) || s.startsWith('<?', i)) {
      const end = s.indexOf('>', i);
      if (end < 0) return -1;
      i = end + 1;
      continue;
    }
    return isAsciiLetter(s[i + 1]) ? i : -1;
  }
  return -1;
}

/**
 * Attributes of the fragment's root start tag, names lower-cased. First
 * occurrence of a name wins, as in HTML. Returns null for malformed tags
 * (unterminated quote or tag).
 */
export function readRootAttributes(markup: string): Map<string, string> | null {
  const s = typeof markup === 'string' ? markup : '';
  const start = findRootTag(s);
  if (start < 0) return null;

  const attrs = new Map<string, string>();
  let i = start + 1;
  while (i < s.length && !isSpace(s[i]) && s[i] !== '>' && s[i] !== '/') i++;

  while (i < s.length) {
    while (i < s.length && isSpace(s[i])) i++;
    if (i >= s.length) return null;
    const ch = s[i];
    if (ch === '>') return attrs;
    if (ch === '/') { i++; continue; }

    const nameStart = i;
    while (i < s.length && !isSpace(s[i]) && s[i] !== '=' && s[i] !== '>' && s[i] !== '/') i++;
    const name = s.slice(nameStart, i).toLowerCase();
    while (i < s.length && isSpace(s[i])) i++;

    let value = '';
    if (s[i] === '=') {
      i++;
      while (i < s.length && isSpace(s[i])) i++;
      const quote = s[i];
      if (quote === '"' || quote === "'") {
        const close = s.indexOf(quote, i + 1);
        if (close < 0) return null;
        value = s.slice(i + 1, close);
        i = close + 1;
      } else {
        const valueStart = i;
        while (i < s.length && !isSpace(s[i]) && s[i] !== '>') i++;
        value = s.slice(valueStart, i);
      }
    }
    if (name && !attrs.has(name)) attrs.set(name, value);
  }
  return null;
}

export function readRootClassTokens(markup: string): string[] {
  const cls = readRootAttributes(markup)?.get('class');
  if (!cls) return [];
  return cls.split(/\s+/).filter(Boolean);
}

function readPeriodToken(token: string): { kind: PeriodKind; seconds: number } | null {
  for (const [kind, prefix] of PERIOD_PREFIXES) {
    if (!token.startsWith(prefix)) continue;
    const digits = token.slice(prefix.length);
    return isDigits(digits) ? { kind, seconds: Number(digits) } : null;
  }
  return null;
}

export function parseHints(rawMarkup: string): HintSet {
  const hints = neutralHintSet();
  // later classes override earlier ones
  for (const token of readRootClassTokens(rawMarkup)) {
    if (TRANSITION_MARKERS.some((m) => token.includes(m))) {
      hints.transitionName = token;
    }
    const period = readPeriodToken(token);
    if (period) {
      hints.periodHints.set(period.kind, period.seconds);
      hints.visibilityHint = 'show';
    } else if (token === HIDE_TOKEN) {
      hints.visibilityHint = 'hide';
    }
  }
  return hints;
}

/** `transition:true` must be present in the target's swap specification. */
export function isTransitionEnabled(targetSwapSpec: string | null | undefined): boolean {
  if (!targetSwapSpec) return false;
  for (const token of targetSwapSpec.split(/\s+/)) {
    if (token.startsWith('transition:')) return token.slice('transition:'.length) === 'true';
  }
  return false;
}

export function parseUpdateHints(rawMarkup: string, targetSwapSpec: string | null): ParsedUpdate {
  return {
    hints: parseHints(rawMarkup),
    transitionEligible: isTransitionEnabled(targetSwapSpec),
  };
}
