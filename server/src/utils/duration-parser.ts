const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Colon form: [d.]hh:mm[:ss[.fraction]] ("00:30:00", "1.12:00:00", "01:30").
 */
const CLOCK_PATTERN = /^(?:(\d+)\.)?(\d+):(\d{1,2})(?::(\d{1,2})(?:\.(\d{1,7}))?)?$/;

/**
 * Parse a duration string into milliseconds.
 *
 * Accepts the unit shorthand "500ms", "90s", "30m", "1h", "2d", the colon form
 * "00:30:00" / "1.02:00:00", or a bare integer meaning whole days.
 *
 * @throws Error if the format is not recognised
 */
export function parseDuration(value: string): number {
  const trimmed = value.trim().toLowerCase();

  const clock = CLOCK_PATTERN.exec(trimmed);
  if (clock) {
    const days = clock[1] ? parseInt(clock[1], 10) : 0;
    const hours = parseInt(clock[2], 10);
    const minutes = parseInt(clock[3], 10);
    const seconds = clock[4] ? parseInt(clock[4], 10) : 0;
    const fraction = clock[5] ? Number(`0.${clock[5]}`) : 0;
    if (hours > 23 || minutes > 59 || seconds > 59) {
      throw new Error(`Invalid duration format: '${value}'`);
    }
    return (
      days * UNIT_MS.d +
      hours * UNIT_MS.h +
      minutes * UNIT_MS.m +
      Math.round((seconds + fraction) * 1000)
    );
  }

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * UNIT_MS.d;
  }

  const shorthand = /^(\d+)(ms|[smhd])$/.exec(trimmed);
  if (shorthand) {
    return parseInt(shorthand[1], 10) * UNIT_MS[shorthand[2]];
  }

  throw new Error(
    `Invalid duration format: '${value}'. Use a form like "500ms", "90s", "30m", "1h", "2d" or "00:30:00"`
  );
}

/**
 * Render milliseconds back into the largest exact unit shorthand.
 */
export function formatDuration(ms: number): string {
  for (const unit of ["d", "h", "m", "s"]) {
    const size = UNIT_MS[unit];
    if (ms > 0 && ms % size === 0) {
      return `${ms / size}${unit}`;
    }
  }
  return `${ms}ms`;
}
