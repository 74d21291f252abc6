import { buildBitstream } from "./bitstream";
import { type PenaltyBreakdown, selectBestMask } from "./mask";
import { type ModuleMatrix, buildFunctionPatterns, placeCodewords } from "./matrix";
import { encode as reedSolomonEncode } from "./reedSolomon";
import {
  Ecc,
  type MaskPattern,
  type Version,
  assertVersion,
  getCapacity,
  getLayout,
} from "./tables";
import { UnsupportedConfigurationError } from "./errors";

type byte = number;
type int = number;

/*---- Explanatory step log ----*/

// Row-major, true for dark. Unset modules read as light.
export type Modules = ReadonlyArray<ReadonlyArray<boolean>>;

function snapshot(matrix: ModuleMatrix): Modules {
  return Object.freeze(matrix.toBooleans().map((row) => Object.freeze(row)));
}

export type EncodeStep =
  | { readonly kind: "bitstream"; readonly message: string; readonly bits: string }
  | { readonly kind: "dataCodewords"; readonly message: string; readonly codewords: readonly byte[] }
  | { readonly kind: "errorCorrection"; readonly message: string; readonly codewords: readonly byte[] }
  | { readonly kind: "combined"; readonly message: string; readonly codewords: readonly byte[] }
  | { readonly kind: "functionPatterns"; readonly message: string; readonly reservedModules: int; readonly modules: Modules }
  | { readonly kind: "dataPlacement"; readonly message: string; readonly dataModules: int; readonly remainderBits: int; readonly modules: Modules }
  | { readonly kind: "maskScored"; readonly message: string; readonly mask: MaskPattern; readonly penalty: PenaltyBreakdown; readonly modules: Modules }
  | { readonly kind: "maskSelected"; readonly message: string; readonly mask: MaskPattern; readonly score: int };

export type EncodeOptions = Readonly<{
  version: Version;
  ecc: Ecc;
  // Record the step log on the result.
  explain?: boolean;
}>;

/*---- QR Code symbol class ----*/

/*
 * A QR Code symbol of version 1 or 2, encoded in byte mode.
 * Instances of this class represent an immutable square grid of dark and light cells.
 *
 * Create one with QrCode.encodeText(); the version and error correction level are
 * always chosen by the caller (see fitVersion() for picking the smallest version).
 */
export class QrCode {
  /*-- Static factory function --*/

  public static encodeText(text: string, options: EncodeOptions): QrCode {
    const { version, ecc, explain = false } = options;
    assertVersion(version);
    if (!(ecc instanceof Ecc))
      throw new UnsupportedConfigurationError(
        `Unsupported error correction level: ${String(ecc)}`
      );

    const steps: EncodeStep[] = [];
    const record = (step: EncodeStep): void => {
      if (explain) steps.push(step);
    };

    const bitstream = buildBitstream(text, version, ecc);
    record({
      kind: "bitstream",
      message: `built bitstream: ${bitstream.bits.length} bits (${bitstream.payloadBits} before padding)`,
      bits: bitstream.bits.join(""),
    });
    record({
      kind: "dataCodewords",
      message: `split into ${bitstream.codewords.length} data codewords`,
      codewords: bitstream.codewords,
    });

    const { ecCodewords } = getCapacity(version, ecc);
    const ec = reedSolomonEncode(bitstream.codewords, ecCodewords);
    record({
      kind: "errorCorrection",
      message: `computed ${ec.length} error correction codewords`,
      codewords: ec,
    });

    const all = [...bitstream.codewords, ...ec];
    record({
      kind: "combined",
      message: `combined ${all.length} data and error correction codewords`,
      codewords: all,
    });

    const base = buildFunctionPatterns(version);
    const reservedModules = base.count("reserved");
    record({
      kind: "functionPatterns",
      message: `reserved ${reservedModules} function modules`,
      reservedModules,
      modules: snapshot(base),
    });

    const filled = placeCodewords(base, all);
    const { remainderBits } = getLayout(version);
    const dataModules = filled.count("data");
    record({
      kind: "dataPlacement",
      message: `placed ${dataModules} data modules (${remainderBits} remainder bits)`,
      dataModules,
      remainderBits,
      modules: snapshot(filled),
    });

    const selection = selectBestMask(filled, ecc);
    for (const { mask, matrix, penalty } of selection.candidates) {
      record({
        kind: "maskScored",
        message: `mask ${mask}: score ${penalty.total}`,
        mask,
        penalty,
        modules: snapshot(matrix),
      });
    }
    record({
      kind: "maskSelected",
      message: `selected mask ${selection.mask}, score ${selection.penalty.total}`,
      mask: selection.mask,
      score: selection.penalty.total,
    });

    return new QrCode(
      version,
      ecc,
      selection.mask,
      selection.penalty,
      selection.matrix.toBooleans(),
      steps
    );
  }

  /*-- Fields --*/

  // The width and height of this QR Code, measured in modules: 21 or 25.
  public readonly size: int;

  // The modules of this QR Code (false = light, true = dark), row-major. Frozen.
  public readonly modules: Modules;

  public readonly steps: readonly EncodeStep[];

  private constructor(
    public readonly version: Version,
    public readonly ecc: Ecc,
    // The index of the mask pattern used in this QR Code, between 0 and 7 (inclusive).
    public readonly mask: MaskPattern,
    public readonly penalty: PenaltyBreakdown,
    modules: boolean[][],
    steps: EncodeStep[]
  ) {
    this.size = modules.length;
    this.modules = Object.freeze(modules.map((row) => Object.freeze(row)));
    this.steps = Object.freeze(steps);
  }

  /*-- Accessor methods --*/

  // Returns the color of the module at the given coordinates, which is false
  // for light or true for dark. The top left corner is (row 0, col 0).
  // If the given coordinates are out of bounds, then false (light) is returned.
  public getModule(row: int, col: int): boolean {
    return (
      0 <= row && row < this.size && 0 <= col && col < this.size && this.modules[row][col]
    );
  }
}
