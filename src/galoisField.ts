type byte = number;
type int = number;

/**
 * Arithmetic in GF(2^8) built from exponent and logarithm tables.
 *
 * QR Codes use the modulus x^8 + x^4 + x^3 + x^2 + 1 (0x11D) with generator 2.
 * The tables are filled once in the constructor and never change afterwards.
 */
export class GaloisField {
  private readonly expTable = new Uint8Array(256);
  private readonly logTable = new Uint8Array(256);

  constructor(public readonly primitive: int = 0x11d) {
    let x = 1;
    for (let i = 0; i < 255; i++) {
      this.expTable[i] = x;
      this.logTable[x] = i;
      x <<= 1;
      if (x & 0x100) x ^= primitive;
    }
    // alpha^255 == alpha^0
    this.expTable[255] = this.expTable[0];
  }

  // Addition and subtraction are both XOR in characteristic 2.
  static add(a: byte, b: byte): byte {
    return a ^ b;
  }

  exp(power: int): byte {
    if (!Number.isInteger(power) || power < 0)
      throw new RangeError(`Exponent out of range: ${power}`);
    return this.expTable[power % 255];
  }

  log(value: byte): int {
    checkByte(value);
    if (value === 0) throw new RangeError("log(0) is undefined");
    return this.logTable[value];
  }

  multiply(a: byte, b: byte): byte {
    checkByte(a);
    checkByte(b);
    if (a === 0 || b === 0) return 0;
    return this.expTable[(this.logTable[a] + this.logTable[b]) % 255];
  }
}

function checkByte(value: int): void {
  if (!Number.isInteger(value) || value >>> 8 !== 0)
    throw new RangeError(`Byte out of range: ${value}`);
}

export const QR_FIELD = new GaloisField(0x11d);
