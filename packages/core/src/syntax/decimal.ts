const DECIMAL = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/**
 * Moves the decimal point of a numeric literal `places` digits to the right
 * (left when negative) on the text itself, so `shiftDecimal('33.5', -2)` is
 * `'0.335'` with no floating-point rounding in between. Text that is not a
 * plain number comes back unchanged.
 */
export function shiftDecimal(text: string, places: number): string {
  const match = DECIMAL.exec(text);
  if (!match) return text;
  const [, sign, whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent) + places;

  let shifted: string;
  if (point <= 0) {
    shifted = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    shifted = digits + '0'.repeat(point - digits.length);
  } else {
    shifted = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  shifted = shifted
    .replace(/^0+(?=\d)/, '')
    .replace(/(\.\d*?)0+$/, '$1')
    .replace(/\.$/, '');
  return `${sign === '-' ? '-' : ''}${shifted || '0'}`;
}
