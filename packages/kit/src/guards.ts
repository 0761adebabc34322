/** Returns `value` unchanged, or throws naming `label` when it is not a positive finite number. */
export function assertPositive(value: number, label: string): number {
  if (Number.isFinite(value) && value > 0) return value;
  throw new RangeError(`${label} must be a positive finite number (got ${value})`);
}

const MAX_SANE_PRICE = 10_000_000;

/** Range check for simulated prices. Catches NaN and runaway walks, not a trading rule. */
export function isSanePrice(value: number): boolean {
  return Number.isFinite(value) && value > 0 && value < MAX_SANE_PRICE;
}
