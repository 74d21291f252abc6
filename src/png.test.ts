import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import jsQR from "jsqr";
import sharp from "sharp";
import { afterEach, describe, expect, it } from "vitest";
import { renderPng, savePng } from "./png";
import { QrCode } from "./qrCode";
import { Ecc } from "./tables";

async function scanPng(png: Buffer) {
  const { data, info } = await sharp(png)
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

const hello = QrCode.encodeText("HELLO", { version: 1, ecc: Ecc.MEDIUM });

describe("renderPng", () => {
  it("renders a scannable image with a quiet zone", async () => {
    const png = await renderPng(hello.modules);
    const meta = await sharp(png).metadata();
    expect(meta.format).toBe("png");
    expect(meta.width).toBe(290);
    expect(meta.height).toBe(290);
    expect(await scanPng(png)).toBe("HELLO");
  });

  it("honours the scale", async () => {
    const png = await renderPng(hello.modules, { scale: 4, margin: 2 });
    expect((await sharp(png).metadata()).width).toBe(100);
  });

  it("rejects a non-positive scale", async () => {
    await expect(renderPng(hello.modules, { scale: 0 })).rejects.toThrow(RangeError);
  });
});

describe("savePng", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("writes a PNG whatever the extension", async () => {
    dir = await mkdtemp(join(tmpdir(), "qr-png-"));
    const file = join(dir, "symbol.img");
    const info = await savePng(hello.modules, file, { scale: 2 });
    expect(info.format).toBe("png");
    expect(info.width).toBe(58);
    expect((await sharp(file).metadata()).format).toBe("png");
  });
});
