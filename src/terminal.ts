import {
  ANSI_RESET,
  ansiBackground,
  ansiForeground,
  parseColour,
} from "./colour";

type Modules = ReadonlyArray<ReadonlyArray<boolean>>;

export type TerminalOptions = Readonly<{
  // Characters drawn for one dark module.
  dark?: string;
  // Characters drawn for one light module.
  light?: string;
  // 1 to 3; each module is repeated this many times across and down.
  scale?: number;
  frame?: boolean;
  darkColour?: string;
  lightColour?: string;
}>;

// Visible width, counting code points rather than UTF-16 units.
function width(text: string): number {
  return [...text].length;
}

export function renderTerminal(modules: Modules, opts: TerminalOptions = {}): string {
  const { scale = 1, frame = false } = opts;
  // Whichever character is missing defaults to the other's width.
  const dark = opts.dark ?? "█".repeat(opts.light === undefined ? 2 : width(opts.light));
  const light = opts.light ?? " ".repeat(width(dark));
  if (!Number.isInteger(scale) || scale < 1 || scale > 3)
    throw new RangeError(`Scale must be 1, 2 or 3: ${scale}`);
  if (width(dark) !== width(light))
    throw new RangeError("Dark and light characters must have the same width");

  const darkPrefix = opts.darkColour ? ansiForeground(parseColour(opts.darkColour)) : "";
  const lightPrefix = opts.lightColour ? ansiBackground(parseColour(opts.lightColour)) : "";
  const coloured = darkPrefix !== "" || lightPrefix !== "";

  // Escape codes are written only where the colour changes.
  const renderRow = (row: ReadonlyArray<boolean>): string => {
    let line = "";
    let previous: boolean | undefined;
    for (const isDark of row) {
      if (coloured && isDark !== previous) {
        line += ANSI_RESET + (isDark ? darkPrefix : lightPrefix);
        previous = isDark;
      }
      line += (isDark ? dark : light).repeat(scale);
    }
    return coloured ? line + ANSI_RESET : line;
  };

  const innerWidth = (modules.length > 0 ? modules[0].length : 0) * scale * width(dark);
  const lines: string[] = [];
  if (frame) lines.push("┌" + "─".repeat(innerWidth) + "┐");
  for (const row of modules) {
    const line = renderRow(row);
    for (let i = 0; i < scale; i++) lines.push(frame ? "│" + line + "│" : line);
  }
  if (frame) lines.push("└" + "─".repeat(innerWidth) + "┘");
  return lines.join("\n");
}
