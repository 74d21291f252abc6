/*
 * QR Code generator library (TypeScript)
 *
 * Copyright (c) Project Nayuki. (MIT License)
 * https://www.nayuki.io/page/qr-code-generator-library
 *
 * Permission is hereby granted, free of charge, to any person obtaining a copy of
 * this software and associated documentation files (the "Software"), to deal in
 * the Software without restriction, including without limitation the rights to
 * use, copy, modify, merge, publish, distribute, sublicense, and/or sell copies of
 * the Software, and to permit persons to whom the Software is furnished to do so,
 * subject to the following conditions:
 * - The above copyright notice and this permission notice shall be included in
 *   all copies or substantial portions of the Software.
 * - The Software is provided "as is", without warranty of any kind, express or
 *   implied, including but not limited to the warranties of merchantability,
 *   fitness for a particular purpose and noninfringement. In no event shall the
 *   authors or copyright holders be liable for any claim, damages or other
 *   liability, whether in an action of contract, tort or otherwise, arising from,
 *   out of or in connection with the Software or the use or other dealings in the
 *   Software.
 */

import { LayoutOverflowError, LayoutUnderflowError } from "./errors";
import {
  type Position,
  type Version,
  getFormatInfoPositions,
  getLayout,
} from "./tables";

type byte = number;
type int = number;

const abs = Math.abs;

/*---- Cell state ----*/

export type Cell =
  | { readonly kind: "unset" }
  | { readonly kind: "reserved"; readonly dark: boolean }
  | { readonly kind: "data"; readonly dark: boolean };

const UNSET: Cell = Object.freeze({ kind: "unset" });

/*---- Module matrix ----*/

/*
 * A square grid of cells for one QR Code version. Function modules are stored as
 * reserved cells, codeword bits as data cells, and nothing may stay unset once
 * placement finishes. Every operation below returns a new matrix.
 */
export class ModuleMatrix {
  // The width and height of this matrix, measured in modules. Equal to version * 4 + 17.
  public readonly size: int;

  private constructor(
    public readonly version: Version,
    private readonly cells: Array<Array<Cell>>
  ) {
    this.size = cells.length;
  }

  public static blank(version: Version): ModuleMatrix {
    const { size } = getLayout(version);
    const cells: Array<Array<Cell>> = [];
    for (let y = 0; y < size; y++) cells.push(new Array<Cell>(size).fill(UNSET));
    return new ModuleMatrix(version, cells);
  }

  public get(row: int, col: int): Cell {
    this.checkBounds(row, col);
    return this.cells[row][col];
  }

  public isReserved(row: int, col: int): boolean {
    return this.get(row, col).kind === "reserved";
  }

  // Dark for dark reserved or data cells; unset cells read as light.
  public isDark(row: int, col: int): boolean {
    const cell = this.get(row, col);
    return cell.kind !== "unset" && cell.dark;
  }

  public count(kind: Cell["kind"]): int {
    let n = 0;
    for (const row of this.cells) for (const cell of row) if (cell.kind === kind) n++;
    return n;
  }

  // Returns a copy with each cell replaced by the callback's result.
  public map(fn: (cell: Cell, row: int, col: int) => Cell): ModuleMatrix {
    return new ModuleMatrix(
      this.version,
      this.cells.map((line, row) => line.map((cell, col) => fn(cell, row, col)))
    );
  }

  // Returns a copy with the given cells marked reserved.
  public withReserved(
    entries: ReadonlyArray<Readonly<{ pos: Position; dark: boolean }>>
  ): ModuleMatrix {
    const cells = this.cells.map((line) => line.slice());
    for (const { pos, dark } of entries) {
      this.checkBounds(pos.row, pos.col);
      cells[pos.row][pos.col] = { kind: "reserved", dark };
    }
    return new ModuleMatrix(this.version, cells);
  }

  // Row-major booleans, true for dark. Unset cells read as light.
  public toBooleans(): boolean[][] {
    return this.cells.map((line) =>
      line.map((cell) => cell.kind !== "unset" && cell.dark)
    );
  }

  private checkBounds(row: int, col: int): void {
    if (row < 0 || row >= this.size || col < 0 || col >= this.size)
      throw new RangeError(`Module (${row}, ${col}) is outside the symbol`);
  }
}

/*---- Function patterns ----*/

// Collects reserved modules in drawing order; later entries overwrite earlier ones.
class PatternBuilder {
  public readonly entries: Array<{ pos: Position; dark: boolean }> = [];

  constructor(private readonly size: int) {}

  set(row: int, col: int, dark: boolean): void {
    if (0 <= row && row < this.size && 0 <= col && col < this.size)
      this.entries.push({ pos: { row, col }, dark });
  }

  // Draws a 7*7 finder pattern with its top-left corner at (row, col), plus the
  // one-module light separator around it. Separator modules may be out of bounds.
  finder(row: int, col: int): void {
    for (let dy = -1; dy <= 7; dy++) {
      for (let dx = -1; dx <= 7; dx++) {
        const dist: int = Math.max(abs(dx - 3), abs(dy - 3)); // Chebyshev/infinity norm from the centre
        this.set(row + dy, col + dx, dist != 2 && dist != 4);
      }
    }
  }

  // Draws a 5*5 alignment pattern centred on (row, col).
  alignment(row: int, col: int): void {
    for (let dy = -2; dy <= 2; dy++) {
      for (let dx = -2; dx <= 2; dx++)
        this.set(row + dy, col + dx, Math.max(abs(dx), abs(dy)) != 1);
    }
  }

  timing(): void {
    for (let i = 8; i < this.size - 8; i++) {
      this.set(6, i, i % 2 == 0);
      this.set(i, 6, i % 2 == 0);
    }
  }
}

/**
 * Returns a matrix for the given version with every function module reserved:
 * finder patterns with separators, timing patterns, the alignment pattern of
 * version 2, the dark module, and both format information areas (light for now,
 * filled in once a mask is chosen).
 */
export function buildFunctionPatterns(version: Version): ModuleMatrix {
  const layout = getLayout(version);
  const builder = new PatternBuilder(layout.size);

  for (const { row, col } of layout.finderOrigins) builder.finder(row, col);
  builder.timing();
  for (const { row, col } of layout.alignmentCentres) builder.alignment(row, col);
  builder.set(layout.darkModule.row, layout.darkModule.col, true);

  let matrix = ModuleMatrix.blank(version).withReserved(builder.entries);
  const { primary, secondary } = getFormatInfoPositions(version);
  const formatArea = [...primary, ...secondary]
    .filter((pos) => !matrix.isReserved(pos.row, pos.col))
    .map((pos) => ({ pos, dark: false }));
  matrix = matrix.withReserved(formatArea);
  return matrix;
}

/*---- Data placement ----*/

// Visits the non-reserved modules in placement order: column pairs from the right
// edge, skipping the vertical timing column, alternating upward and downward.
export function* zigzagPositions(matrix: ModuleMatrix): Generator<Position> {
  const size = matrix.size;
  for (let right = size - 1; right >= 1; right -= 2) {
    // Index of right column in each column pair
    if (right == 6) right = 5;
    const upward: boolean = ((right + 1) & 2) == 0;
    for (let vert = 0; vert < size; vert++) {
      for (let j = 0; j < 2; j++) {
        const col: int = right - j;
        const row: int = upward ? size - 1 - vert : vert;
        if (!matrix.isReserved(row, col)) yield { row, col };
      }
    }
  }
}

/**
 * Fills every non-reserved module with the codeword bits, most significant bit
 * first, followed by the version's remainder bits (all zero). The given matrix is
 * left untouched.
 *
 * @throws LayoutOverflowError if the bits run out before the modules do.
 * @throws LayoutUnderflowError if bits are left once every module is filled.
 */
export function placeCodewords(
  matrix: ModuleMatrix,
  codewords: Readonly<Array<byte>>
): ModuleMatrix {
  const { remainderBits } = getLayout(matrix.version);
  const totalBits = codewords.length * 8 + remainderBits;
  const bitAt = (i: int): boolean =>
    i < codewords.length * 8 && ((codewords[i >>> 3] >>> (7 - (i & 7))) & 1) != 0;

  const assigned = new Map<int, boolean>();
  let i: int = 0; // Bit index into the data
  for (const { row, col } of zigzagPositions(matrix)) {
    if (i >= totalBits) throw new LayoutOverflowError(dataModuleCount(matrix), totalBits);
    assigned.set(row * matrix.size + col, bitAt(i));
    i++;
  }
  if (i != totalBits) throw new LayoutUnderflowError(i, totalBits);

  return matrix.map((cell, row, col) => {
    if (cell.kind === "reserved") return cell;
    const dark = assigned.get(row * matrix.size + col);
    return dark === undefined ? cell : { kind: "data", dark };
  });
}

function dataModuleCount(matrix: ModuleMatrix): int {
  return matrix.size * matrix.size - matrix.count("reserved");
}
