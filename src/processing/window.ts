/**
 * Fetch window computation.
 *
 * The next window starts at the checkpoint (latest stored transaction
 * date) and ends now, but never reaches further back than the API's
 * lookback limit.
 */

import { format, subDays } from 'date-fns';
import { DEFAULT_LOOKBACK_DAYS, MAX_LOOKBACK_DAYS } from '../core/config.js';
import type { DateWindow } from '../core/types.js';

export const API_DATE_FORMAT = 'dd-MM-yyyy';

export function defaultCheckpoint(now: Date): Date {
  return subDays(now, DEFAULT_LOOKBACK_DAYS);
}

export function computeWindow(checkpoint: Date, now: Date = new Date()): DateWindow {
  const earliest = subDays(now, MAX_LOOKBACK_DAYS);
  const from = checkpoint.getTime() < earliest.getTime() ? earliest : checkpoint;
  return {
    from,
    to: now,
    from_param: format(from, API_DATE_FORMAT),
    to_param: format(now, API_DATE_FORMAT),
  };
}

/** Window covering the last `days` days, clamped to the lookback limit */
export function windowForDays(days: number, now: Date = new Date()): DateWindow {
  return computeWindow(subDays(now, days), now);
}
