const rupiahNumber = new Intl.NumberFormat('id-ID', {
  maximumFractionDigits: 0,
  useGrouping: true,
});

/**
 * Format an amount for display as `Rp. 1.234.567`
 *
 * Fractions are truncated toward zero, not rounded. Non-finite values
 * display as `Rp. 0`.
 */
export default function formatRupiah(value: number): string {
  if (!Number.isFinite(value)) return 'Rp. 0';

  // Math.trunc(-0.5) is -0, which Intl renders as "-0"
  const whole = Math.trunc(value) || 0;
  return `Rp. ${rupiahNumber.format(whole)}`;
}
