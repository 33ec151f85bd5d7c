/**
 * Formats a number with two decimals, rounding exact ties to even
 * (`20.125` → `"20.12"`). `Number.prototype.toFixed` rounds ties away from zero.
 */
export function toFixed2(value: number): string {
  // A double sits exactly halfway between two hundredths only when it is an
  // odd multiple of 1/8.
  const eighths = value * 8;
  if (!Number.isInteger(eighths) || eighths % 2 === 0) {
    return value.toFixed(2);
  }

  const lower = Math.floor(value * 100);
  const even = lower % 2 === 0 ? lower : lower + 1;
  return (even / 100).toFixed(2);
}
