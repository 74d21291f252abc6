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

import type { ModuleMatrix } from "./matrix";
import {
  type Ecc,
  type MaskPattern,
  MASKS,
  getFormatInfo,
  getFormatInfoPositions,
} from "./tables";

type int = number;

const floor = Math.floor;
const abs = Math.abs;

// For use in scorePenalty(), when evaluating which mask is best.
const PENALTY_N1: int = 3;
const PENALTY_N2: int = 3;
const PENALTY_N3: int = 40;
const PENALTY_N4: int = 10;

// Dark-light-dark-dark-dark-light-dark with four light modules on one side.
const FINDER_LIKE: readonly (readonly boolean[])[] = [
  [true, false, true, true, true, false, true, false, false, false, false],
  [false, false, false, false, true, false, true, true, true, false, true],
];

export type MaskPredicate = (row: int, col: int) => boolean;

// A data module is inverted wherever its mask's predicate holds.
export const MASK_PATTERNS: readonly MaskPredicate[] = [
  (r, c) => (r + c) % 2 == 0,
  (r) => r % 2 == 0,
  (_, c) => c % 3 == 0,
  (r, c) => (r + c) % 3 == 0,
  (r, c) => (floor(r / 2) + floor(c / 3)) % 2 == 0,
  (r, c) => ((r * c) % 2) + ((r * c) % 3) == 0,
  (r, c) => (((r * c) % 2) + ((r * c) % 3)) % 2 == 0,
  (r, c) => (((r + c) % 2) + ((r * c) % 3)) % 2 == 0,
];

export type PenaltyBreakdown = Readonly<{
  runs: int;
  blocks: int;
  finderLike: int;
  balance: int;
  total: int;
}>;

export type MaskCandidate = Readonly<{
  mask: MaskPattern;
  // Masked and carrying its own format information.
  matrix: ModuleMatrix;
  penalty: PenaltyBreakdown;
}>;

export type MaskSelection = MaskCandidate &
  Readonly<{
    // All eight candidates, indexed by mask.
    candidates: readonly MaskCandidate[];
  }>;

// XORs the data modules with the given mask pattern. Reserved modules are never
// touched, so applying the same mask twice gives back the original matrix.
export function applyMask(matrix: ModuleMatrix, mask: MaskPattern): ModuleMatrix {
  const invert = MASK_PATTERNS[mask];
  if (!invert) throw new RangeError(`Mask value out of range: ${mask}`);
  return matrix.map((cell, row, col) =>
    cell.kind === "data" && invert(row, col) ? { kind: "data", dark: !cell.dark } : cell
  );
}

// Writes both copies of the format string for the given level and mask.
export function writeFormatInfo(
  matrix: ModuleMatrix,
  ecc: Ecc,
  mask: MaskPattern
): ModuleMatrix {
  const bits = getFormatInfo(ecc, mask);
  const { primary, secondary } = getFormatInfoPositions(matrix.version);
  const entries = [primary, secondary].flatMap((positions) =>
    positions.map((pos, i) => ({ pos, dark: bits.charAt(i) == "1" }))
  );
  return matrix.withReserved(entries);
}

/**
 * Scores a finished symbol with the four standard rules. Lower is better.
 *
 * - runs: each row or column run of n >= 5 same-coloured modules adds 3 + (n - 5)
 * - blocks: each 2*2 block of one colour adds 3
 * - finderLike: each 1:1:3:1:1 pattern with four light modules beside it adds 40
 * - balance: 10 for every full 5% the dark share deviates from 50%
 */
export function scorePenalty(
  modules: ReadonlyArray<ReadonlyArray<boolean>>
): PenaltyBreakdown {
  const size: int = modules.length;
  const lines: Array<ReadonlyArray<boolean>> = [...modules];
  for (let x = 0; x < size; x++) lines.push(modules.map((row) => row[x]));

  let runs: int = 0;
  let finderLike: int = 0;
  for (const line of lines) {
    // Adjacent modules in a row or column having the same color
    let runLength = 1;
    for (let i = 1; i <= size; i++) {
      if (i < size && line[i] == line[i - 1]) {
        runLength++;
      } else {
        if (runLength >= 5) runs += PENALTY_N1 + (runLength - 5);
        runLength = 1;
      }
    }
    // Finder-like patterns
    for (let i = 0; i + 11 <= size; i++) {
      if (FINDER_LIKE.some((pattern) => pattern.every((dark, k) => line[i + k] == dark)))
        finderLike += PENALTY_N3;
    }
  }

  // 2*2 blocks of modules having same color
  let blocks: int = 0;
  for (let y = 0; y < size - 1; y++) {
    for (let x = 0; x < size - 1; x++) {
      const color: boolean = modules[y][x];
      if (
        color == modules[y][x + 1] &&
        color == modules[y + 1][x] &&
        color == modules[y + 1][x + 1]
      )
        blocks += PENALTY_N2;
    }
  }

  // Balance of dark and light modules
  let dark: int = 0;
  for (const row of modules)
    dark = row.reduce((sum, color) => sum + (color ? 1 : 0), dark);
  const total: int = size * size;
  const percent: int = floor((dark * 100) / total);
  const balance: int = floor(abs(percent - 50) / 5) * PENALTY_N4;

  return { runs, blocks, finderLike, balance, total: runs + blocks + finderLike + balance };
}

/**
 * Tries all eight masks on a filled matrix and keeps the one with the smallest
 * penalty. Ties go to the lower mask number. Each candidate carries its own
 * format information while it is scored.
 */
export function selectBestMask(filled: ModuleMatrix, ecc: Ecc): MaskSelection {
  let best: MaskCandidate | undefined;
  const candidates: MaskCandidate[] = [];
  for (const mask of MASKS) {
    const matrix = writeFormatInfo(applyMask(filled, mask), ecc, mask);
    const candidate = { mask, matrix, penalty: scorePenalty(matrix.toBooleans()) };
    candidates.push(candidate);
    if (!best || candidate.penalty.total < best.penalty.total) best = candidate;
  }
  if (!best) throw new Error("Unreachable");
  return { ...best, candidates };
}
