import type { Rgb } from '../core/config-types';

const clamp01 = (n: number) => (Number.isFinite(n) ? Math.min(1, Math.max(0, n)) : 0);

/** Start colour drifts towards the end colour as the carousel scrolls right. */
export function gradientAt(ratio: number, start: Rgb, end: Rgb): string {
  const t = clamp01(ratio);
  const [r, g, b] = [0, 1, 2].map((i) => Math.round(start[i] + (end[i] - start[i]) * t));
  return `linear-gradient(to right, rgb(${r}, ${g}, ${b}), rgb(${end[0]}, ${end[1]}, ${end[2]}))`;
}
