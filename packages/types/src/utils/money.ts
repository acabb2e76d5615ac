/**
 * Format a number with two decimals, `.` between thousands and `,` before the cents
 * (1234.5 -> "1.234,50").
 */
export function formatBrazilianAmount(amount: number): string {
  if (!Number.isFinite(amount)) {
    throw new Error(`Cannot format amount: ${amount}`);
  }
  const fixed = Math.abs(amount).toFixed(2);
  const [integerPart = '0', cents = '00'] = fixed.split('.');
  const grouped = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
  return `${amount < 0 ? '-' : ''}${grouped},${cents}`;
}
