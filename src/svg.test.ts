import { describe, expect, it } from "vitest";
import { buildPath, renderSvg } from "./svg";

const T = true;
const F = false;

describe("buildPath", () => {
  it("draws one stroke per dark run", () => {
    expect(buildPath([[T, F, T], [F, F, T]])).toBe("M0 1h2m2 0h2M4 3h2");
  });

  it("shifts every stroke by the margin", () => {
    expect(buildPath([[T, F, T], [F, F, T]], 1)).toBe("M2 3h2m2 0h2M6 5h2");
  });

  it("skips trailing light runs", () => {
    expect(buildPath([[T, T, F, F]])).toBe("M0 1h4");
  });
});

describe("renderSvg", () => {
  const modules = [
    [T, F],
    [F, T],
  ];

  it("renders a transparent symbol by default", () => {
    expect(renderSvg(modules, { margin: 0, size: 100 })).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 4 4" width="100" height="100" shape-rendering="crispEdges">' +
        '<path stroke="#000" stroke-width="2" d="M0 1h2M2 3h2" /></svg>'
    );
  });

  it("fills the background when asked", () => {
    expect(renderSvg(modules, { margin: 0, color: "#123456", background: "#fff" })).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 4 4" width="256" height="256" shape-rendering="crispEdges">' +
        '<rect width="4" height="4" fill="#fff" />' +
        '<path stroke="#123456" stroke-width="2" d="M0 1h2M2 3h2" /></svg>'
    );
  });

  it("adds a four module quiet zone by default", () => {
    const grid = Array.from({ length: 21 }, () => new Array<boolean>(21).fill(false));
    expect(renderSvg(grid)).toContain('viewBox="0 0 58 58"');
  });

  it("rejects a negative margin", () => {
    expect(() => renderSvg(modules, { margin: -1 })).toThrow(RangeError);
  });
});
