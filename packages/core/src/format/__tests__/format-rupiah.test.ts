import { describe, it, expect } from 'vitest';
import formatRupiah from '../format-rupiah.js';

describe('formatRupiah', () => {
  it('should group thousands with dots', () => {
    expect(formatRupiah(5000)).toBe('Rp. 5.000');
    expect(formatRupiah(1234567)).toBe('Rp. 1.234.567');
  });

  it('should leave small amounts ungrouped', () => {
    expect(formatRupiah(0)).toBe('Rp. 0');
    expect(formatRupiah(999)).toBe('Rp. 999');
  });

  it('should truncate fractions toward zero', () => {
    expect(formatRupiah(1999.99)).toBe('Rp. 1.999');
    expect(formatRupiah(-0.4)).toBe('Rp. 0');
  });

  it('should keep the sign of negative balances', () => {
    expect(formatRupiah(-4750)).toBe('Rp. -4.750');
  });

  it('should fall back to zero for non-finite values', () => {
    expect(formatRupiah(Number.NaN)).toBe('Rp. 0');
  });
});
