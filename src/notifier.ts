export type WarningSink = (message: string) => void;

const consoleSink: WarningSink = (message) => {
  // eslint-disable-next-line no-console
  console.warn(message);
};

let sink: WarningSink = consoleSink;

/**
 * Report a non-fatal diagnostic (e.g. a token that could not be assigned).
 * Matching never stops because of a warning.
 */
export function warn(message: string): void {
  sink(`Warning: ${message}`);
}

/**
 * Replace the warning sink. Returns the previous sink so callers (tests) can restore it.
 */
export function setWarningSink(next: WarningSink | undefined): WarningSink {
  const prev = sink;
  sink = next ?? consoleSink;
  return prev;
}
