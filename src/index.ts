import { fitVersion } from "./bitstream";
import { QrCode } from "./qrCode";
import { renderSvg } from "./svg";
import { Ecc, type Version } from "./tables";

export { QrCode } from "./qrCode";
export type { EncodeOptions, EncodeStep, Modules } from "./qrCode";
export { buildBitstream, fitVersion, toLatin1Bytes } from "./bitstream";
export type { Bitstream } from "./bitstream";
export { GaloisField, QR_FIELD } from "./galoisField";
export { encode as reedSolomonEncode, generatorPolynomial } from "./reedSolomon";
export { ModuleMatrix, buildFunctionPatterns, placeCodewords } from "./matrix";
export type { Cell } from "./matrix";
export { MASK_PATTERNS, applyMask, scorePenalty, selectBestMask, writeFormatInfo } from "./mask";
export type { MaskCandidate, MaskSelection, PenaltyBreakdown } from "./mask";
export { Ecc, getCapacity, getLayout, getFormatInfo } from "./tables";
export type { Capacity, MaskPattern, Version, VersionLayout } from "./tables";
export * from "./errors";
export { parseColour } from "./colour";
export { renderSvg } from "./svg";
export type { SvgOptions } from "./svg";
export { renderTerminal } from "./terminal";
export type { TerminalOptions } from "./terminal";
export { renderPng, savePng } from "./png";
export type { PngOptions } from "./png";

export type MakeSvgOptions = {
  color?: string;
  background?: string;
  size?: number;
  margin?: number;
  ecc?: Ecc;
  // Smallest version that fits when omitted.
  version?: Version;
};

export default function makeSvg(
  text: string,
  opts: MakeSvgOptions = {
    color: "#000",
    size: 256,
  }
): string {
  const { ecc = Ecc.MEDIUM, version: requested, ...svg } = opts;
  const version = requested ?? fitVersion(text, ecc);
  const qr = QrCode.encodeText(text, { version, ecc });
  return renderSvg(qr.modules, svg);
}
