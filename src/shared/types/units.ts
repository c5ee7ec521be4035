/**
 * Decimal <-> base unit conversion
 * NO FLOATING POINT: parsing goes straight from the string to bigint.
 */

export const DEFAULT_DECIMALS = 18;

/**
 * Utility: Convert a decimal string to base units
 * parseUnits('1.5', 6) === 1500000n
 */
export function parseUnits(value: string, decimals: number = DEFAULT_DECIMALS): bigint {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid decimal amount: ${value}`);
  }

  const whole = match[1];
  const fraction = match[2] ?? '';
  if (fraction.length > decimals) {
    throw new Error(`Too many decimal places (max ${decimals}): ${value}`);
  }

  const base = 10n ** BigInt(decimals);
  return BigInt(whole) * base + BigInt(fraction.padEnd(decimals, '0') || '0');
}

/**
 * Utility: Format base units as a decimal string (for display only)
 */
export function formatUnits(amount: bigint, decimals: number = DEFAULT_DECIMALS): string {
  const sign = amount < 0n ? '-' : '';
  const abs = amount < 0n ? -amount : amount;
  const base = 10n ** BigInt(decimals);

  const whole = abs / base;
  const fraction = (abs % base).toString().padStart(decimals, '0').replace(/0+$/, '');

  return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}
