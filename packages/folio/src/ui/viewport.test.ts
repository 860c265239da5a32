import { visibleWidth } from "@mariozechner/pi-tui";
import { describe, expect, it } from "vitest";
import { Viewport } from "./viewport.js";

function lines(n: number): string[] {
  return Array.from({ length: n }, (_, i) => `line ${i}`);
}

describe("Viewport", () => {
  it("clamps scrolling to the content", () => {
    const vp = new Viewport();
    vp.setHeight(4);
    vp.setContent(lines(10));

    expect(vp.maxOffset).toBe(6);
    expect(vp.scrollBy(-1)).toBe(false);
    expect(vp.offset).toBe(0);

    expect(vp.scrollBy(100)).toBe(true);
    expect(vp.offset).toBe(6);
    expect(vp.scrollBy(1)).toBe(false);
  });

  it("has no scroll room when the content fits", () => {
    const vp = new Viewport();
    vp.setHeight(20);
    vp.setContent(lines(3));

    expect(vp.maxOffset).toBe(0);
    vp.gotoBottom();
    expect(vp.offset).toBe(0);
  });

  it("keeps the offset across content changes, clamped", () => {
    const vp = new Viewport();
    vp.setHeight(4);
    vp.setContent(lines(20));
    vp.setOffset(10);

    vp.setContent(lines(30));
    expect(vp.offset).toBe(10);

    vp.setContent(lines(8));
    expect(vp.offset).toBe(4);
  });

  it("re-clamps when the window grows", () => {
    const vp = new Viewport();
    vp.setHeight(2);
    vp.setContent(lines(10));
    vp.gotoBottom();
    expect(vp.offset).toBe(8);

    vp.setHeight(6);
    expect(vp.offset).toBe(4);
  });

  it("returns exactly height rows padded to width", () => {
    const vp = new Viewport();
    vp.setHeight(3);
    vp.setContent(["alpha", "a much longer line"]);

    const rows = vp.visibleLines(8);
    expect(rows).toHaveLength(3);
    expect(rows[0]).toBe("alpha   ");
    expect(rows[1].startsWith("a much l")).toBe(true);
    expect(visibleWidth(rows[1])).toBe(8);
    expect(rows[2]).toBe("        ");
  });

  it("shows the window starting at the offset", () => {
    const vp = new Viewport();
    vp.setHeight(2);
    vp.setContent(lines(5));
    vp.scrollBy(2);

    expect(vp.visibleLines(6)).toEqual(["line 2", "line 3"]);
  });
});
