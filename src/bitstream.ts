import { CapacityExceededError, UnencodableCharacterError } from "./errors";
import { Ecc, type Version, VERSIONS, getCapacity } from "./tables";

type bit = number;
type byte = number;
type int = number;

// Byte mode indicator.
const MODE_BYTE = 0b0100;
// Character count field width for byte mode in versions 1 to 9.
const COUNT_BITS = 8;
const PAD_CODEWORDS: readonly byte[] = [0xec, 0x11];

export type Bitstream = Readonly<{
  // Every bit including terminator and padding, 8 * dataCodewords long.
  bits: readonly bit[];
  codewords: readonly byte[];
  // Length of mode indicator, count field and payload before any padding.
  payloadBits: int;
}>;

export class BitBuffer {
  private readonly bits: bit[] = [];

  // Appends the given number of low-order bits of the given value.
  // Requires 0 <= len <= 31 and 0 <= val < 2^len.
  push(val: int, len: int): void {
    if (len < 0 || len > 31 || val >>> len != 0)
      throw new RangeError("Value out of range");
    for (let i = len - 1; i >= 0; i--) this.bits.push((val >>> i) & 1);
  }

  get length(): int {
    return this.bits.length;
  }

  toBits(): bit[] {
    return this.bits.slice();
  }

  // Packs the bits into bytes, big endian. The length must be a multiple of 8.
  toBytes(): byte[] {
    if (this.bits.length % 8 != 0)
      throw new RangeError("Bit length is not a whole number of codewords");
    const bytes: byte[] = [];
    for (let i = 0; i < this.bits.length; i += 8) {
      let b = 0;
      for (let j = 0; j < 8; j++) b = (b << 1) | this.bits[i + j];
      bytes.push(b);
    }
    return bytes;
  }
}

// One byte per character, ISO-8859-1. Anything above U+00FF is rejected rather
// than transcoded.
export function toLatin1Bytes(text: string): byte[] {
  const bytes: byte[] = [];
  let index = 0;
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (code > 0xff) throw new UnencodableCharacterError(ch, index);
    bytes.push(code);
    index += ch.length;
  }
  return bytes;
}

// Mode indicator, count field and 8 bits per byte.
export function payloadBitLength(byteCount: int): int {
  return 4 + COUNT_BITS + byteCount * 8;
}

export function buildBitstream(
  text: string,
  version: Version,
  ecc: Ecc
): Bitstream {
  const { dataCodewords } = getCapacity(version, ecc);
  const capacityBits = dataCodewords * 8;
  const data = toLatin1Bytes(text);

  const payloadBits = payloadBitLength(data.length);
  if (payloadBits > capacityBits || data.length >= 1 << COUNT_BITS)
    throw new CapacityExceededError(payloadBits, capacityBits, version, ecc.name);

  const bb = new BitBuffer();
  bb.push(MODE_BYTE, 4);
  bb.push(data.length, COUNT_BITS);
  for (const b of data) bb.push(b, 8);

  // Add terminator and pad up to a byte if applicable
  bb.push(0, Math.min(4, capacityBits - bb.length));
  bb.push(0, (8 - (bb.length % 8)) % 8);

  // Pad with alternating bytes until data capacity is reached
  for (let i = 0; bb.length < capacityBits; i++)
    bb.push(PAD_CODEWORDS[i % 2], 8);

  return Object.freeze({
    bits: Object.freeze(bb.toBits()),
    codewords: Object.freeze(bb.toBytes()),
    payloadBits,
  });
}

// Returns the smallest supported version whose capacity holds the text.
export function fitVersion(text: string, ecc: Ecc): Version {
  const required = payloadBitLength(toLatin1Bytes(text).length);
  let capacityBits = 0;
  for (const version of VERSIONS) {
    capacityBits = getCapacity(version, ecc).dataCodewords * 8;
    if (required <= capacityBits) return version;
  }
  throw new CapacityExceededError(
    required,
    capacityBits,
    VERSIONS[VERSIONS.length - 1],
    ecc.name
  );
}
