import strftime from 'strftime';

const strftimeUTC = strftime.utc();

/** Render an instant with a strftime pattern (`%Y-%m-%d %H:%M:%S`). Log times are UTC, so is the output. */
export function formatTimestamp(timestamp: Date, pattern: string): string {
  return strftimeUTC(pattern, timestamp);
}
