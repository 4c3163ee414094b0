import { AppError, ArithmeticError } from './errors.js';

/**
 * Fixed-point decimal backed by a scaled bigint.
 *
 * Addition, subtraction and multiplication are exact. Division and
 * `round` take an explicit scale and round HALF_UP (ties away from zero),
 * so results are identical on every platform.
 */

export type DecimalInput = Decimal | string | number | bigint;

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

function divHalfUp(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new ArithmeticError('Division by zero');
  }
  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;

  let quotient = n / d;
  if ((n % d) * 2n >= d) quotient += 1n;
  return negative ? -quotient : quotient;
}

export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);
  static readonly ONE = new Decimal(1n, 0);

  private constructor(
    readonly units: bigint,
    readonly scale: number,
  ) {}

  static from(value: DecimalInput): Decimal {
    if (value instanceof Decimal) return value;
    if (typeof value === 'bigint') return new Decimal(value, 0);
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new ArithmeticError(`Cannot represent ${value} as a decimal`);
      }
      return Decimal.parse(String(value));
    }
    return Decimal.parse(value.trim());
  }

  /** Nullable database quantities count as zero. */
  static orZero(value: DecimalInput | null | undefined): Decimal {
    return value === null || value === undefined ? Decimal.ZERO : Decimal.from(value);
  }

  static sum(values: readonly Decimal[]): Decimal {
    return values.reduce((acc, v) => acc.add(v), Decimal.ZERO);
  }

  private static parse(text: string): Decimal {
    const match = DECIMAL_PATTERN.exec(text);
    const intPart = match?.[2] ?? '';
    const fracPart = match?.[3] ?? '';
    if (!match || (intPart === '' && fracPart === '')) {
      throw new AppError(422, `Invalid decimal value: "${text}"`, 'INVALID_DECIMAL');
    }

    const exponent = match[4] ? parseInt(match[4], 10) : 0;
    let units = BigInt(intPart + fracPart || '0');
    let scale = fracPart.length - exponent;
    if (scale < 0) {
      units *= pow10(-scale);
      scale = 0;
    }
    return new Decimal(match[1] === '-' ? -units : units, scale);
  }

  private aligned(other: Decimal): [bigint, bigint, number] {
    if (this.scale === other.scale) return [this.units, other.units, this.scale];
    if (this.scale > other.scale) {
      return [this.units, other.units * pow10(this.scale - other.scale), this.scale];
    }
    return [this.units * pow10(other.scale - this.scale), other.units, other.scale];
  }

  add(other: DecimalInput): Decimal {
    const [a, b, scale] = this.aligned(Decimal.from(other));
    return new Decimal(a + b, scale);
  }

  sub(other: DecimalInput): Decimal {
    const [a, b, scale] = this.aligned(Decimal.from(other));
    return new Decimal(a - b, scale);
  }

  mul(other: DecimalInput): Decimal {
    const o = Decimal.from(other);
    return new Decimal(this.units * o.units, this.scale + o.scale);
  }

  div(other: DecimalInput, scale: number): Decimal {
    const o = Decimal.from(other);
    if (o.units === 0n) {
      throw new ArithmeticError('Division by zero');
    }
    const numerator = this.units * pow10(o.scale + scale);
    const denominator = o.units * pow10(this.scale);
    return new Decimal(divHalfUp(numerator, denominator), scale);
  }

  round(scale: number): Decimal {
    if (scale >= this.scale) {
      return new Decimal(this.units * pow10(scale - this.scale), scale);
    }
    return new Decimal(divHalfUp(this.units, pow10(this.scale - scale)), scale);
  }

  /** Smallest integer not less than this value. */
  ceil(): bigint {
    const divisor = pow10(this.scale);
    const quotient = this.units / divisor;
    return this.units % divisor > 0n ? quotient + 1n : quotient;
  }

  abs(): Decimal {
    return this.units < 0n ? new Decimal(-this.units, this.scale) : this;
  }

  negate(): Decimal {
    return new Decimal(-this.units, this.scale);
  }

  compare(other: DecimalInput): -1 | 0 | 1 {
    const [a, b] = this.aligned(Decimal.from(other));
    if (a === b) return 0;
    return a > b ? 1 : -1;
  }

  eq(other: DecimalInput): boolean {
    return this.compare(other) === 0;
  }

  gt(other: DecimalInput): boolean {
    return this.compare(other) > 0;
  }

  gte(other: DecimalInput): boolean {
    return this.compare(other) >= 0;
  }

  lt(other: DecimalInput): boolean {
    return this.compare(other) < 0;
  }

  lte(other: DecimalInput): boolean {
    return this.compare(other) <= 0;
  }

  isZero(): boolean {
    return this.units === 0n;
  }

  isNegative(): boolean {
    return this.units < 0n;
  }

  isPositive(): boolean {
    return this.units > 0n;
  }

  toFixed(scale: number = this.scale): string {
    const value = scale === this.scale ? this : this.round(scale);
    const negative = value.units < 0n;
    const digits = (negative ? -value.units : value.units).toString();
    if (scale === 0) return `${negative ? '-' : ''}${digits}`;

    const padded = digits.padStart(scale + 1, '0');
    const intPart = padded.slice(0, padded.length - scale);
    const fracPart = padded.slice(padded.length - scale);
    return `${negative ? '-' : ''}${intPart}.${fracPart}`;
  }

  toNumber(): number {
    return Number(this.toFixed());
  }

  toString(): string {
    return this.toFixed();
  }

  toJSON(): string {
    return this.toFixed();
  }
}
