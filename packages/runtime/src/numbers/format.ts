// Fixed-point formatting
//
// Rounds half to even on the exact binary value of a number, so 0.125 (exact)
// rounds to "0.12" while 2.675 (stored as 2.67499999...) rounds to "2.67".

// toFixed is exact up to 100 fractional digits, which covers every double
// whose rounding at the requested precision could be a tie.
const EXACT_DIGITS = 100;

/**
 * Format a number with exactly `digits` fractional digits.
 */
export function formatFixed(value: number, digits: number): string {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return String(value);
  }

  const exact = value.toFixed(EXACT_DIGITS);
  const negative = exact.startsWith('-');
  const [whole, fraction] = (negative ? exact.slice(1) : exact).split('.');

  let scaled = BigInt(whole + fraction.slice(0, digits));
  const rest = fraction.slice(digits);
  const lead = rest.charAt(0);
  const tail = rest.slice(1);

  if (lead > '5' || (lead === '5' && /[1-9]/.test(tail))) {
    scaled += 1n;
  } else if (lead === '5' && scaled % 2n === 1n) {
    scaled += 1n;
  }

  const text = scaled.toString().padStart(digits + 1, '0');
  const integerPart = text.slice(0, text.length - digits);
  const fractionPart = text.slice(text.length - digits);
  const sign = negative ? '-' : '';

  return digits > 0 ? `${sign}${integerPart}.${fractionPart}` : `${sign}${integerPart}`;
}

/**
 * Round a number to `digits` decimal places, half to even.
 */
export function roundTo(value: number, digits: number): number {
  return Number(formatFixed(value, digits));
}
