import { describe, expect, it } from "vitest";
import { CapacityExceededError } from "./errors";
import { buildBitstream } from "./bitstream";
import { applyMask, writeFormatInfo } from "./mask";
import { buildFunctionPatterns, placeCodewords } from "./matrix";
import { QrCode } from "./qrCode";
import { encode } from "./reedSolomon";
import { Ecc } from "./tables";

const HELLO_1M = [
  "#######.##.#..#######",
  "#.....#..##.#.#.....#",
  "#.###.#..####.#.###.#",
  "#.###.#.#..#..#.###.#",
  "#.###.#.#...#.#.###.#",
  "#.....#.#.##..#.....#",
  "#######.#.#.#.#######",
  "........#####........",
  "#...#.######.#####..#",
  "...###..#.###..#.####",
  "#.##..#.#.##..###..#.",
  "###..#...#...##.#....",
  "..#.###..#..###...##.",
  "........###.###..#.##",
  "#######.##..##...#.#.",
  "#.....#....##..#...#.",
  "#.###.#.#..#..###.#.#",
  "#.###.#....##....#.##",
  "#.###.#..###..####...",
  "#.....#..#...##......",
  "#######.#...#####.#.#",
];

const draw = (modules: ReadonlyArray<ReadonlyArray<boolean>>): string[] =>
  modules.map((row) => row.map((dark) => (dark ? "#" : ".")).join(""));

describe("QrCode.encodeText", () => {
  it("encodes HELLO at 1-M", () => {
    const qr = QrCode.encodeText("HELLO", { version: 1, ecc: Ecc.MEDIUM });
    expect(qr.size).toBe(21);
    expect(qr.mask).toBe(4);
    expect(qr.penalty.total).toBe(332);
    expect(draw(qr.modules)).toEqual(HELLO_1M);
  });

  it("encodes a version 2 symbol", () => {
    const qr = QrCode.encodeText("version two payload", { version: 2, ecc: Ecc.QUARTILE });
    expect(qr.size).toBe(25);
    expect(qr.version).toBe(2);
    expect(qr.mask).toBe(6);
    expect(qr.penalty.total).toBe(364);
    expect(qr.getModule(18, 18)).toBe(true);
    expect(qr.getModule(17, 8)).toBe(true);
  });

  it("encodes an empty string", () => {
    const qr = QrCode.encodeText("", { version: 1, ecc: Ecc.HIGH });
    expect(qr.mask).toBe(6);
    expect(qr.penalty.total).toBe(410);
  });

  it("records no steps unless asked", () => {
    expect(QrCode.encodeText("HELLO", { version: 1, ecc: Ecc.MEDIUM }).steps).toEqual([]);
  });

  it("records each step when explaining", () => {
    const { steps } = QrCode.encodeText("HELLO", { version: 1, ecc: Ecc.MEDIUM, explain: true });
    expect(steps.map((s) => s.kind)).toEqual([
      "bitstream",
      "dataCodewords",
      "errorCorrection",
      "combined",
      "functionPatterns",
      "dataPlacement",
      ...new Array<string>(8).fill("maskScored"),
      "maskSelected",
    ]);
    expect(steps.map((s) => s.message)).toEqual([
      "built bitstream: 128 bits (52 before padding)",
      "split into 16 data codewords",
      "computed 10 error correction codewords",
      "combined 26 data and error correction codewords",
      "reserved 233 function modules",
      "placed 208 data modules (0 remainder bits)",
      "mask 0: score 380",
      "mask 1: score 474",
      "mask 2: score 378",
      "mask 3: score 392",
      "mask 4: score 332",
      "mask 5: score 501",
      "mask 6: score 499",
      "mask 7: score 463",
      "selected mask 4, score 332",
    ]);
    expect(steps[2]).toMatchObject({
      kind: "errorCorrection",
      codewords: [35, 115, 35, 153, 236, 8, 201, 247, 55, 223],
    });
  });

  it("snapshots the matrix as it is built", () => {
    const { steps, modules } = QrCode.encodeText("HELLO", {
      version: 1,
      ecc: Ecc.MEDIUM,
      explain: true,
    });
    const base = buildFunctionPatterns(1);
    const { codewords } = buildBitstream("HELLO", 1, Ecc.MEDIUM);
    const filled = placeCodewords(base, [...codewords, ...encode(codewords, 10)]);

    expect(steps[4]).toMatchObject({ kind: "functionPatterns", modules: base.toBooleans() });
    expect(steps[5]).toMatchObject({ kind: "dataPlacement", modules: filled.toBooleans() });
    expect(steps[6]).toMatchObject({
      kind: "maskScored",
      mask: 0,
      modules: writeFormatInfo(applyMask(filled, 0), Ecc.MEDIUM, 0).toBooleans(),
    });
    const chosen = steps[10];
    expect(chosen.kind === "maskScored" ? draw(chosen.modules) : []).toEqual(HELLO_1M);
    expect(chosen).toMatchObject({ mask: 4, modules });
  });

  it("freezes the snapshots", () => {
    const { steps } = QrCode.encodeText("HELLO", { version: 2, ecc: Ecc.LOW, explain: true });
    for (const step of steps) {
      if (!("modules" in step)) continue;
      expect(step.modules).toHaveLength(25);
      expect(Object.isFrozen(step.modules)).toBe(true);
      expect(Object.isFrozen(step.modules[0])).toBe(true);
    }
    expect(steps.filter((s) => "modules" in s)).toHaveLength(10);
  });

  it("reports remainder bits on version 2", () => {
    const { steps } = QrCode.encodeText("HELLO", { version: 2, ecc: Ecc.LOW, explain: true });
    const placement = steps.find((s) => s.kind === "dataPlacement");
    expect(placement?.message).toBe("placed 359 data modules (7 remainder bits)");
  });

  it("freezes the modules", () => {
    const qr = QrCode.encodeText("HELLO", { version: 1, ecc: Ecc.MEDIUM });
    expect(Object.isFrozen(qr.modules)).toBe(true);
    expect(Object.isFrozen(qr.modules[0])).toBe(true);
  });

  it("reads out of bounds modules as light", () => {
    const qr = QrCode.encodeText("HELLO", { version: 1, ecc: Ecc.MEDIUM });
    expect(qr.getModule(0, 0)).toBe(true);
    expect(qr.getModule(-1, 0)).toBe(false);
    expect(qr.getModule(0, 21)).toBe(false);
  });

  it("rejects text that does not fit", () => {
    expect(() => QrCode.encodeText("A".repeat(15), { version: 1, ecc: Ecc.MEDIUM })).toThrow(
      CapacityExceededError
    );
  });
});
