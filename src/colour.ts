import { InvalidColourError } from "./errors";

export type Rgb = readonly [number, number, number];

export type Colour = Readonly<{
  rgb: Rgb;
  // SGR foreground code (30-37, 90-97) when the colour was given as one.
  ansi?: number;
}>;

const ANSI_RGB: Readonly<Record<number, Rgb>> = {
  30: [0, 0, 0],
  31: [128, 0, 0],
  32: [0, 128, 0],
  33: [128, 128, 0],
  34: [0, 0, 128],
  35: [128, 0, 128],
  36: [0, 128, 128],
  37: [192, 192, 192],
  90: [128, 128, 128],
  91: [255, 0, 0],
  92: [0, 255, 0],
  93: [255, 255, 0],
  94: [0, 0, 255],
  95: [255, 0, 255],
  96: [0, 255, 255],
  97: [255, 255, 255],
};

const NAMED: Readonly<Record<string, Rgb>> = {
  black: [0, 0, 0],
  white: [255, 255, 255],
  red: [255, 0, 0],
  green: [0, 255, 0],
  blue: [0, 0, 255],
  yellow: [255, 255, 0],
  cyan: [0, 255, 255],
  magenta: [255, 0, 255],
  gray: [128, 128, 128],
  grey: [128, 128, 128],
};

const ESC = "\x1b";

// Accepts "#rrggbb", a colour name, or an SGR code as 31, "31", "[31m" or "\x1b[31m".
export function parseColour(spec: string | number): Colour {
  if (typeof spec === "number") return fromAnsi(spec, String(spec));

  const raw = spec.trim();
  const hex = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(raw);
  if (hex) {
    return {
      rgb: [parseInt(hex[1], 16), parseInt(hex[2], 16), parseInt(hex[3], 16)],
    };
  }

  const name = raw.toLowerCase();
  if (Object.hasOwn(NAMED, name)) return { rgb: NAMED[name] };

  const code = /^(?:\x1b)?\[?(\d{1,3})m?$/.exec(raw);
  if (code) return fromAnsi(Number(code[1]), spec);

  throw new InvalidColourError(spec);
}

function fromAnsi(code: number, spec: string): Colour {
  const rgb = ANSI_RGB[code];
  if (!rgb) throw new InvalidColourError(spec);
  return { rgb, ansi: code };
}

export function toHex(colour: Colour): string {
  return (
    "#" + colour.rgb.map((c) => c.toString(16).padStart(2, "0")).join("")
  );
}

// Escape sequence that colours the text itself.
export function ansiForeground(colour: Colour): string {
  if (colour.ansi !== undefined) return `${ESC}[${colour.ansi}m`;
  const [r, g, b] = colour.rgb;
  return `${ESC}[38;2;${r};${g};${b}m`;
}

// Escape sequence that colours the cell behind the text.
export function ansiBackground(colour: Colour): string {
  if (colour.ansi !== undefined) return `${ESC}[${colour.ansi + 10}m`;
  const [r, g, b] = colour.rgb;
  return `${ESC}[48;2;${r};${g};${b}m`;
}

export const ANSI_RESET = `${ESC}[0m`;
