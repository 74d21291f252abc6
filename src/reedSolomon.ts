import { GaloisField, QR_FIELD } from "./galoisField";

type byte = number;
type int = number;

// Returns the generator polynomial (x - a^0) * (x - a^1) * ... * (x - a^{degree-1}),
// coefficients stored from highest to lowest power, including the leading 1.
// For example degree 2 gives x^2 + 3x + 2, stored as [1, 3, 2].
export function generatorPolynomial(
  degree: int,
  field: GaloisField = QR_FIELD
): Array<byte> {
  if (!Number.isInteger(degree) || degree < 0 || degree > 254)
    throw new RangeError(`Degree out of range: ${degree}`);
  let result: Array<byte> = [1];
  for (let i = 0; i < degree; i++) {
    // Multiply the current product by (x + a^i); minus is plus in this field
    const root = field.exp(i);
    const next: Array<byte> = new Array<byte>(result.length + 1).fill(0);
    result.forEach((coef, j) => {
      next[j] ^= coef;
      next[j + 1] ^= field.multiply(coef, root);
    });
    result = next;
  }
  return result;
}

/**
 * Computes the error correction codewords for one block of data codewords: the
 * remainder of data(x) * x^ecCount divided by the generator polynomial.
 */
export function encode(
  data: Readonly<Array<byte>>,
  ecCount: int,
  field: GaloisField = QR_FIELD
): Array<byte> {
  if (ecCount === 0) return [];
  // Drop the leading monomial, which is always 1
  const divisor = generatorPolynomial(ecCount, field).slice(1);
  const result: Array<byte> = divisor.map(() => 0);
  for (const b of data) {
    // Polynomial long division, one data codeword at a time
    const factor: byte = b ^ (result.shift() ?? 0);
    result.push(0);
    if (factor === 0) continue;
    divisor.forEach((coef, i) => {
      result[i] ^= field.multiply(coef, factor);
    });
  }
  return result;
}
