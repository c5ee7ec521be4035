import { describe, it, expect } from '@jest/globals';
import { formatUnits, parseUnits } from '../src/shared/types';

describe('Units', () => {
  it('should parse decimal strings into base units', () => {
    expect(parseUnits('10.12356')).toBe(10_123_560_000_000_000_000n);
    expect(parseUnits('1.5', 6)).toBe(1_500_000n);
    expect(parseUnits('777', 0)).toBe(777n);
  });

  it('should reject malformed amounts', () => {
    expect(() => parseUnits('abc')).toThrow('Invalid decimal amount: abc');
    expect(() => parseUnits('-1')).toThrow('Invalid decimal amount: -1');
    expect(() => parseUnits('0.0000001', 6)).toThrow('Too many decimal places (max 6): 0.0000001');
  });

  it('should format base units without trailing zeros', () => {
    expect(formatUnits(10_123_560_000_000_000_000n)).toBe('10.12356');
    expect(formatUnits(-1_500_000n, 6)).toBe('-1.5');
    expect(formatUnits(5_000_000n, 6)).toBe('5');
    expect(formatUnits(5n, 0)).toBe('5');
  });
});
