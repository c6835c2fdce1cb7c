export type Unit = '' | '%' | 'mm';

/** Exact base-10 number: `coefficient / 10^scale`. */
export interface Decimal {
  coefficient: bigint;
  scale: number;
}

export interface NumericValue {
  magnitude: Decimal;
  unit: Unit;
  /** Written without a decimal point. */
  integer: boolean;
}

export interface Adjustment {
  sign: '+' | '-';
  amount: Decimal;
  /** Empty when the adjustment takes the unit of the value it is applied to. */
  unit: Unit;
}

export class ValueFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValueFormatError';
  }
}

const VALUE_RE = /^(-?)(\d*\.?\d*)(%|mm)?$/;
const ADJUSTMENT_RE = /^=?\s*([+-])\s*(\d*\.?\d*)(%|mm)?$/;

export function parseDecimal(digits: string, negative = false): Decimal {
  if (!/\d/.test(digits)) {
    throw new ValueFormatError(`Invalid number: ${digits || '(empty)'}`);
  }

  const [whole, fraction = ''] = digits.split('.');
  const coefficient = BigInt(`${whole}${fraction}` || '0');
  return normalizeDecimal({ coefficient: negative ? -coefficient : coefficient, scale: fraction.length });
}

/** `"0.2"`, `"20%"`, `"45mm"`, `"-1.5"`. */
export function parseValue(text: string): NumericValue {
  const match = text.trim().match(VALUE_RE);
  if (!match || !/\d/.test(match[2])) {
    throw new ValueFormatError(`Invalid value format: ${text}`);
  }

  return {
    magnitude: parseDecimal(match[2], match[1] === '-'),
    unit: toUnit(match[3]),
    integer: !match[2].includes('.'),
  };
}

/** `"=+5%"`, `"=-0.05"`, or the same without the leading `=`. */
export function parseAdjustment(text: string): Adjustment {
  const match = text.trim().match(ADJUSTMENT_RE);
  if (!match || !/\d/.test(match[2])) {
    throw new ValueFormatError(`Invalid relative value format: ${text}`);
  }

  return {
    sign: match[1] === '-' ? '-' : '+',
    amount: parseDecimal(match[2]),
    unit: toUnit(match[3]),
  };
}

/**
 * Add or subtract an adjustment. A unit on the adjustment must equal the
 * value's unit. Unitless results never go below zero.
 */
export function applyAdjustment(value: NumericValue, adjustment: Adjustment): NumericValue {
  if (adjustment.unit !== '' && adjustment.unit !== value.unit) {
    throw new ValueFormatError(
      `Unit mismatch: expected ${value.unit || 'no unit'}, got ${adjustment.unit}`,
    );
  }

  const delta = adjustment.sign === '-' ? negate(adjustment.amount) : adjustment.amount;
  let magnitude = addDecimals(value.magnitude, delta);
  if (value.unit === '' && magnitude.coefficient < 0n) {
    magnitude = { coefficient: 0n, scale: 0 };
  }

  return { magnitude, unit: value.unit, integer: value.integer };
}

/**
 * Integral results of integer values are written without a point; anything
 * else gets the shortest form with at least one fractional digit.
 */
export function formatValue(value: NumericValue): string {
  return `${formatDecimal(value.magnitude, value.integer)}${value.unit}`;
}

export function formatDecimal(decimal: Decimal, integer = false): string {
  const { coefficient, scale } = normalizeDecimal(decimal);
  const negative = coefficient < 0n;
  const digits = (negative ? -coefficient : coefficient).toString();
  const sign = negative ? '-' : '';

  if (scale === 0) {
    return integer ? `${sign}${digits}` : `${sign}${digits}.0`;
  }

  const padded = digits.padStart(scale + 1, '0');
  return `${sign}${padded.slice(0, -scale)}.${padded.slice(-scale)}`;
}

export function addDecimals(a: Decimal, b: Decimal): Decimal {
  const scale = Math.max(a.scale, b.scale);
  return normalizeDecimal({
    coefficient: rescale(a, scale) + rescale(b, scale),
    scale,
  });
}

/** Drop trailing fractional zeros. */
export function normalizeDecimal(decimal: Decimal): Decimal {
  let { coefficient, scale } = decimal;
  while (scale > 0 && coefficient % 10n === 0n) {
    coefficient /= 10n;
    scale -= 1;
  }
  return { coefficient, scale };
}

function negate(decimal: Decimal): Decimal {
  return { coefficient: -decimal.coefficient, scale: decimal.scale };
}

function rescale(decimal: Decimal, scale: number): bigint {
  return decimal.coefficient * 10n ** BigInt(scale - decimal.scale);
}

function toUnit(text: string | undefined): Unit {
  return text === '%' || text === 'mm' ? text : '';
}
