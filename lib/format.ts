/**
 * One-decimal formatting that sends exact halves to the even digit
 * (6.25 → "6.2", 6.75 → "6.8"). `toFixed` alone rounds those up.
 */
export function formatOneDecimal(value: number): string {
  // A double sits exactly halfway between tenths only when it is an odd multiple of 0.25.
  if (Number.isInteger(value * 4) && !Number.isInteger(value * 2)) {
    const lower = Math.floor(value * 10);
    const tenths = lower % 2 === 0 ? lower : lower + 1;
    return (tenths / 10).toFixed(1);
  }
  return value.toFixed(1);
}
