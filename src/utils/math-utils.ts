/**
 * Greatest common divisor of integers (Euclid). Empty input gives 1.
 */
export function gcd(numbers: Iterable<number>): number {
  let result: number | null = null;
  for (const n of numbers) {
    let a: number = result === null ? Math.abs(n) : result;
    let b = result === null ? 0 : Math.abs(n);
    while (b) {
      [a, b] = [b, a % b];
    }
    result = a;
  }
  return result ?? 1;
}

/**
 * Number of digits after the decimal point to print value in width chars.
 */
export function precisionDigits(value: number, width: number): number {
  let precision = value === 0 ? 0 : Math.log10(Math.abs(value));
  if (precision < 0) precision = 0;
  precision = width - Math.floor(precision);
  precision -= value < 0 ? 3 : 2; // sign and decimal point
  return Math.max(precision, 1);
}

/**
 * Mass divided by the magnitude of the charge; neutral masses pass through.
 */
export function massChargeRatio(mass: number, charge: number): number {
  return charge === 0 ? mass : mass / Math.abs(charge);
}
