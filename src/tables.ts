import { UnsupportedConfigurationError } from "./errors";

type int = number;

export type Version = 1 | 2;
export type MaskPattern = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;
export type EccName = "L" | "M" | "Q" | "H";

export type Position = Readonly<{ row: int; col: int }>;

export const VERSIONS: readonly Version[] = [1, 2];
export const MASKS: readonly MaskPattern[] = [0, 1, 2, 3, 4, 5, 6, 7];

/*---- Error correction level ----*/

/*
 * The error correction level in a QR Code symbol. Immutable.
 */
export class Ecc {
  /*-- Constants --*/

  public static readonly LOW = new Ecc(0, 1, "L"); // The QR Code can tolerate about  7% erroneous codewords
  public static readonly MEDIUM = new Ecc(1, 0, "M"); // The QR Code can tolerate about 15% erroneous codewords
  public static readonly QUARTILE = new Ecc(2, 3, "Q"); // The QR Code can tolerate about 25% erroneous codewords
  public static readonly HIGH = new Ecc(3, 2, "H"); // The QR Code can tolerate about 30% erroneous codewords

  public static readonly ALL: readonly Ecc[] = [
    Ecc.LOW,
    Ecc.MEDIUM,
    Ecc.QUARTILE,
    Ecc.HIGH,
  ];

  /*-- Constructor and fields --*/

  private constructor(
    // In the range 0 to 3, ordered from weakest to strongest.
    public readonly ordinal: int,
    // The 2-bit indicator written into the format information.
    public readonly formatBits: int,
    public readonly name: EccName
  ) {}

  // Looks up a level by its letter, case-insensitively.
  public static fromName(name: string): Ecc {
    const upper = name.trim().toUpperCase();
    const ecc = Ecc.ALL.find((e) => e.name === upper);
    if (!ecc)
      throw new UnsupportedConfigurationError(
        `Unsupported error correction level: ${name}`
      );
    return ecc;
  }

  public toString(): string {
    return this.name;
  }
}

/*---- Capacity ----*/

export type Capacity = Readonly<{
  totalCodewords: int;
  dataCodewords: int;
  ecCodewords: int;
  // Versions 1 and 2 always use a single block, so there is nothing to interleave.
  ecBlocks: 1;
}>;

function capacity(totalCodewords: int, ecCodewords: int): Capacity {
  return Object.freeze({
    totalCodewords,
    dataCodewords: totalCodewords - ecCodewords,
    ecCodewords,
    ecBlocks: 1,
  });
}

// Indexed by Ecc.ordinal (L, M, Q, H).
const CAPACITY: Readonly<Record<Version, readonly Capacity[]>> = {
  1: [capacity(26, 7), capacity(26, 10), capacity(26, 13), capacity(26, 17)],
  2: [capacity(44, 10), capacity(44, 16), capacity(44, 22), capacity(44, 28)],
};

/*---- Layout ----*/

export type VersionLayout = Readonly<{
  version: Version;
  size: int;
  // Top-left corners of the three 7*7 finder patterns.
  finderOrigins: readonly Position[];
  alignmentCentres: readonly Position[];
  darkModule: Position;
  // Modules left for data and error correction once every function pattern is drawn.
  rawDataModules: int;
  // Zero bits placed after the last codeword.
  remainderBits: int;
}>;

function layout(
  version: Version,
  alignmentCentres: readonly Position[],
  rawDataModules: int
): VersionLayout {
  const size = version * 4 + 17;
  return Object.freeze({
    version,
    size,
    finderOrigins: Object.freeze([
      { row: 0, col: 0 },
      { row: 0, col: size - 7 },
      { row: size - 7, col: 0 },
    ]),
    alignmentCentres: Object.freeze(alignmentCentres),
    darkModule: { row: version * 4 + 9, col: 8 },
    rawDataModules,
    remainderBits: rawDataModules % 8,
  });
}

const LAYOUT: Readonly<Record<Version, VersionLayout>> = {
  1: layout(1, [], 208),
  2: layout(2, [{ row: 18, col: 18 }], 359),
};

/*---- Format information ----*/

// 15-bit format strings, most significant bit first, with BCH bits included and
// the 101010000010010 mask already applied. Indexed by [Ecc.ordinal][mask].
const FORMAT_INFO: readonly (readonly string[])[] = [
  [
    "111011111000100", "111001011110011", "111110110101010", "111100010011101",
    "110011000101111", "110001100011000", "110110001000001", "110100101110110",
  ], // Low
  [
    "101010000010010", "101000100100101", "101111001111100", "101101101001011",
    "100010111111001", "100000011001110", "100111110010111", "100101010100000",
  ], // Medium
  [
    "011010101011111", "011000001101000", "011111100110001", "011101000000110",
    "010010010110100", "010000110000011", "010111011011010", "010101111101101",
  ], // Quartile
  [
    "001011010001001", "001001110111110", "001110011100111", "001100111010000",
    "000011101100010", "000001001010101", "000110100001100", "000100000111011",
  ], // High
];

export type FormatInfoPositions = Readonly<{
  // Around the top-left finder.
  primary: readonly Position[];
  // Split below the top-right finder and beside the bottom-left finder.
  secondary: readonly Position[];
}>;

// Both position lists follow the format string, most significant bit first.
function formatInfoPositions(size: int): FormatInfoPositions {
  const primary: Position[] = [];
  for (let col = 0; col <= 5; col++) primary.push({ row: 8, col });
  primary.push({ row: 8, col: 7 }, { row: 8, col: 8 }, { row: 7, col: 8 });
  for (let row = 5; row >= 0; row--) primary.push({ row, col: 8 });

  const secondary: Position[] = [];
  for (let i = 0; i < 7; i++) secondary.push({ row: size - 1 - i, col: 8 });
  for (let i = 0; i < 8; i++) secondary.push({ row: 8, col: size - 8 + i });

  return Object.freeze({
    primary: Object.freeze(primary),
    secondary: Object.freeze(secondary),
  });
}

const FORMAT_POSITIONS: Readonly<Record<Version, FormatInfoPositions>> = {
  1: formatInfoPositions(LAYOUT[1].size),
  2: formatInfoPositions(LAYOUT[2].size),
};

/*---- Lookups ----*/

export function isVersion(value: unknown): value is Version {
  return value === 1 || value === 2;
}

export function assertVersion(value: unknown): asserts value is Version {
  if (!isVersion(value))
    throw new UnsupportedConfigurationError(
      `Unsupported version: ${String(value)} (only versions 1 and 2)`
    );
}

export function isMaskPattern(value: int): value is MaskPattern {
  return Number.isInteger(value) && value >= 0 && value <= 7;
}

function assertEcc(ecc: unknown): asserts ecc is Ecc {
  if (!(ecc instanceof Ecc))
    throw new UnsupportedConfigurationError(
      `Unsupported error correction level: ${String(ecc)}`
    );
}

export function getCapacity(version: Version, ecc: Ecc): Capacity {
  assertVersion(version);
  assertEcc(ecc);
  return CAPACITY[version][ecc.ordinal];
}

export function getLayout(version: Version): VersionLayout {
  assertVersion(version);
  return LAYOUT[version];
}

export function getFormatInfo(ecc: Ecc, mask: MaskPattern): string {
  assertEcc(ecc);
  if (!isMaskPattern(mask))
    throw new UnsupportedConfigurationError(`Unsupported mask pattern: ${mask}`);
  return FORMAT_INFO[ecc.ordinal][mask];
}

export function getFormatInfoPositions(version: Version): FormatInfoPositions {
  assertVersion(version);
  return FORMAT_POSITIONS[version];
}

export function sizeOf(version: Version): int {
  return getLayout(version).size;
}
