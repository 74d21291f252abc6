import makeSvg, { Ecc, UnencodableCharacterError } from "./index";
import jsQR from "jsqr";
import sharp from "sharp";

import { expect, test } from "vitest";

async function scanCode(svg: string) {
  const { data, info } = await sharp(Buffer.from(svg))
    .flatten({
      background: { r: 255, g: 255, b: 255 },
    })
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const code = jsQR(
    new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength),
    info.width,
    info.height
  );

  return code?.data;
}

test("should make a scannable svg", async () => {
  const svg = makeSvg("hello world");
  expect(await scanCode(svg)).toBe("hello world");
});

test("should grow to version 2 for longer text", async () => {
  const text = "https://example.com/qr/v2";
  const svg = makeSvg(text, { size: 256 });
  expect(svg).toContain('viewBox="0 0 66 66"');
  expect(await scanCode(svg)).toBe(text);
});

test("should honour an explicit version and level", async () => {
  const svg = makeSvg("HELLO", { version: 2, ecc: Ecc.HIGH, background: "#fff" });
  expect(svg).toContain('<rect width="66" height="66" fill="#fff" />');
  expect(await scanCode(svg)).toBe("HELLO");
});

test("should reject emojis", () => {
  expect(() => makeSvg("👋🌍")).toThrow(UnencodableCharacterError);
});

test("should handle empty strings", async () => {
  const svg = makeSvg("");
  expect(await scanCode(svg)).toBe("");
});
