// Trailing ion charge notation: 'SO4_2-', '[AsO4]3-', 'O2-2', 'NH4+', 'Pt2++'

const SEPARATED_MAGNITUDE_SIGN = /([\]_])(\d+)([+-])$/;
const SIGN_MAGNITUDE = /([+-])(\d+)$/;
const SIGN_RUN = /_?([+-]+)$/;

/**
 * Split a formula into the formula without charge suffix and the charge.
 * A bracket pair enclosing the whole remainder is removed with the suffix.
 */
export function splitCharge(formula: string): [string, number] {
  let body: string;
  let charge: number;

  const separated = SEPARATED_MAGNITUDE_SIGN.exec(formula);
  const signed = separated ? null : SIGN_MAGNITUDE.exec(formula);
  const run = separated || signed ? null : SIGN_RUN.exec(formula);

  if (separated) {
    body = formula.slice(0, separated.index) + (separated[1] === ']' ? ']' : '');
    charge = signOf(separated[3]) * parseInt(separated[2] ?? '0', 10);
  } else if (signed) {
    body = formula.slice(0, signed.index);
    charge = signOf(signed[1]) * parseInt(signed[2] ?? '0', 10);
  } else if (run) {
    body = formula.slice(0, run.index);
    charge = 0;
    for (const sign of run[1] ?? '') charge += signOf(sign);
  } else {
    return [formula, 0];
  }

  if (body.startsWith('[') && matchingBracket(body, 0) === body.length - 1) {
    body = body.slice(1, -1);
  }
  return [body, charge];
}

/**
 * Charge suffix: '' for 0, '+' or '-' for magnitude 1, else '2+', '_2+', ...
 */
export function formatCharge(charge: number, separator = ''): string {
  if (charge === 0) return '';
  const sign = charge > 0 ? '+' : '-';
  const magnitude = Math.abs(charge);
  return magnitude === 1 ? sign : `${separator}${magnitude}${sign}`;
}

/**
 * Append charge to formula, as '[formula]2+' or with separator as 'formula_2+'.
 */
export function joinCharge(formula: string, charge: number, separator = ''): string {
  if (charge === 0) return formula;
  if (separator) return `${formula}${formatCharge(charge, separator)}`;
  return `[${formula}]${formatCharge(charge)}`;
}

function signOf(sign: string | undefined): number {
  return sign === '-' ? -1 : 1;
}

// Index of the ']' closing the '[' at start, or -1
function matchingBracket(text: string, start: number): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    if (text[i] === '[') depth++;
    else if (text[i] === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}
