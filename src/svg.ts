type Modules = ReadonlyArray<ReadonlyArray<boolean>>;

export type SvgOptions = {
  // Stroke colour of the dark modules.
  color?: string;
  // Fill behind the whole symbol; transparent when omitted.
  background?: string;
  // Rendered width and height in pixels.
  size?: number;
  // Quiet zone, in modules.
  margin?: number;
};

function group<T>(arr: ReadonlyArray<T>): T[][] {
  const groups: T[][] = [];
  let last = arr[0];
  let current: T[] = [];
  for (const item of arr) {
    if (item === last) {
      current.push(item);
    } else {
      groups.push(current);
      current = [item];
      last = item;
    }
  }
  groups.push(current);
  return groups;
}

const DOT_SIZE = 2;

// One horizontal stroke per run of dark modules, DOT_SIZE thick.
export function buildPath(modules: Modules, margin = 0): string {
  const OFFSET = DOT_SIZE / 2;
  const origin = margin * DOT_SIZE;
  let path = "";
  for (let y = 0; y < modules.length; y++) {
    const line = group(modules[y]);
    const len = line.length;
    const top = origin + y * DOT_SIZE + OFFSET;

    for (let i = 0; i < len; i++) {
      const run = line[i];

      if (run[0] === false && i === 0) {
        // if the first run is light, move straight past it to the next one
        path += `M${origin + run.length * DOT_SIZE} ${top}`;
        continue;
      } else if (run[0] === true && i === 0) {
        // Otherwise we have to move to the start of the line
        path += `M${origin} ${top}`;
      }

      // a trailing light run needs no move at all
      if (i === len - 1 && run[0] === false) {
        break;
      }

      if (run[0]) {
        path += `h${run.length * DOT_SIZE}`;
      } else {
        path += `m${run.length * DOT_SIZE} 0`;
      }
    }
  }
  return path;
}

export function renderSvg(modules: Modules, opts: SvgOptions = {}): string {
  const { color = "#000", background, size = 256, margin = 4 } = opts;
  if (!Number.isInteger(margin) || margin < 0)
    throw new RangeError(`Margin must be a non-negative integer: ${margin}`);
  const path = buildPath(modules, margin);
  const widthHeight = (modules.length + margin * 2) * DOT_SIZE;
  const fill =
    background === undefined
      ? ""
      : `<rect width="${widthHeight}" height="${widthHeight}" fill="${background}" />`;
  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${widthHeight} ${widthHeight}" width="${size}" height="${size}" shape-rendering="crispEdges">${fill}<path stroke="${color}" stroke-width="${DOT_SIZE}" d="${path}" /></svg>`;
}
