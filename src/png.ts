import sharp from "sharp";
import { parseColour, toHex } from "./colour";
import { renderSvg } from "./svg";

type Modules = ReadonlyArray<ReadonlyArray<boolean>>;

export type PngOptions = Readonly<{
  // Pixels per module.
  scale?: number;
  // Quiet zone, in modules.
  margin?: number;
  darkColour?: string;
  lightColour?: string;
}>;

function pipeline(modules: Modules, opts: PngOptions): sharp.Sharp {
  const { scale = 10, margin = 4 } = opts;
  if (!Number.isInteger(scale) || scale < 1)
    throw new RangeError(`Scale must be a positive integer: ${scale}`);
  const svg = renderSvg(modules, {
    color: toHex(parseColour(opts.darkColour ?? "black")),
    background: toHex(parseColour(opts.lightColour ?? "white")),
    size: (modules.length + margin * 2) * scale,
    margin,
  });
  return sharp(Buffer.from(svg)).png();
}

export async function renderPng(modules: Modules, opts: PngOptions = {}): Promise<Buffer> {
  return pipeline(modules, opts).toBuffer();
}

// Always writes PNG, whatever the file's extension.
export async function savePng(
  modules: Modules,
  file: string,
  opts: PngOptions = {}
): Promise<sharp.OutputInfo> {
  return pipeline(modules, opts).toFile(file);
}
