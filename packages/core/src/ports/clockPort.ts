export interface ClockPort {
  nowMs(): number;
}

/**
 * System clock adapter. Tests inject a fixed clock instead.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}
