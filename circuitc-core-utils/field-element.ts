const BIGINT_ZERO = BigInt(0);
const BIGINT_ONE = BigInt(1);
const BIGINT_TWO = BigInt(2);

/** Scalar field modulus of the BN254 curve. */
const FIELD_MODULUS = BigInt(
  '21888242871839275222246405745257275088548364400416034343698204186575808495617'
);

const DECIMAL_INTEGER_PATTERN = /^-?\d+$/;

/**
 * An element of the prime field, stored as its canonical representative in `[0, MODULUS)`.
 * The order exposed by `compare` and friends is the order of canonical representatives.
 */
export default class FieldElement {
  static readonly MODULUS: bigint = FIELD_MODULUS;

  static readonly ZERO: FieldElement = new FieldElement(BIGINT_ZERO);

  static readonly ONE: FieldElement = new FieldElement(BIGINT_ONE);

  private constructor(private readonly value: bigint) {}

  static fromBigInt(value: bigint): FieldElement {
    const remainder = value % FIELD_MODULUS;
    return new FieldElement(remainder < BIGINT_ZERO ? remainder + FIELD_MODULUS : remainder);
  }

  static fromNumber(value: number): FieldElement {
    if (!Number.isSafeInteger(value)) {
      throw new Error(`${value} is not a safe integer.`);
    }
    return FieldElement.fromBigInt(BigInt(value));
  }

  static fromString(value: string): FieldElement | null {
    if (!DECIMAL_INTEGER_PATTERN.test(value)) return null;
    return FieldElement.fromBigInt(BigInt(value));
  }

  add(other: FieldElement): FieldElement {
    return FieldElement.fromBigInt(this.value + other.value);
  }

  subtract(other: FieldElement): FieldElement {
    return FieldElement.fromBigInt(this.value - other.value);
  }

  multiply(other: FieldElement): FieldElement {
    return FieldElement.fromBigInt(this.value * other.value);
  }

  /** Multiplicative inverse by Fermat's little theorem, or null for zero. */
  inverse(): FieldElement | null {
    if (this.isZero()) return null;
    return this.pow(FIELD_MODULUS - BIGINT_TWO);
  }

  divide(other: FieldElement): FieldElement | null {
    const inverse = other.inverse();
    return inverse == null ? null : this.multiply(inverse);
  }

  pow(exponent: bigint): FieldElement {
    if (exponent < BIGINT_ZERO) {
      throw new Error(`Negative exponent ${exponent} is not supported.`);
    }
    let result = BIGINT_ONE;
    let base = this.value;
    let remaining = exponent;
    while (remaining > BIGINT_ZERO) {
      if (remaining % BIGINT_TWO === BIGINT_ONE) {
        result = (result * base) % FIELD_MODULUS;
      }
      base = (base * base) % FIELD_MODULUS;
      remaining /= BIGINT_TWO;
    }
    return new FieldElement(result);
  }

  isZero(): boolean {
    return this.value === BIGINT_ZERO;
  }

  equals(other: FieldElement): boolean {
    return this.value === other.value;
  }

  compare(other: FieldElement): -1 | 0 | 1 {
    if (this.value < other.value) return -1;
    if (this.value > other.value) return 1;
    return 0;
  }

  lessThan(other: FieldElement): boolean {
    return this.compare(other) < 0;
  }

  lessThanOrEqual(other: FieldElement): boolean {
    return this.compare(other) <= 0;
  }

  greaterThan(other: FieldElement): boolean {
    return this.compare(other) > 0;
  }

  greaterThanOrEqual(other: FieldElement): boolean {
    return this.compare(other) >= 0;
  }

  toBigInt(): bigint {
    return this.value;
  }

  toString(): string {
    return this.value.toString();
  }

  toJSON(): string {
    return this.toString();
  }
}
