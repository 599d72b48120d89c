// Non-fatal outcomes. Nothing here throws: a skipped update or navigation keeps
// the previous valid state.
import { verboseLog } from '../env/logging';

export type SkipReason =
  | 'parse-miss'      // no hint in the fragment
  | 'invalid-target'  // swap target / carousel element not mounted
  | 'out-of-range';   // navigation would leave [0, itemCount)

export function reportSkip(tag: string, reason: SkipReason, detail?: unknown): void {
  verboseLog(tag, `skip: ${reason}`, detail);
}
