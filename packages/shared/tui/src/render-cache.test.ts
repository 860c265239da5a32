import { describe, expect, it, vi } from "vitest";
import { RenderCache } from "./render-cache.js";

describe("RenderCache", () => {
  it("keys entries by source and width", () => {
    const cache = new RenderCache();
    cache.set("home", 80, "wide");
    cache.set("home", 40, "narrow");
    expect(cache.get("home", 80)).toBe("wide");
    expect(cache.get("home", 40)).toBe("narrow");
    expect(cache.get("about", 80)).toBeUndefined();
  });

  it("renders only on a miss", () => {
    const cache = new RenderCache();
    const render = vi.fn(() => "out");
    expect(cache.getOrRender("post:a", 60, render)).toBe("out");
    expect(cache.getOrRender("post:a", 60, render)).toBe("out");
    expect(render).toHaveBeenCalledTimes(1);
  });

  it("evicts the oldest entries when full", () => {
    const cache = new RenderCache(10);
    for (let i = 0; i < 10; i++) cache.set(`s${i}`, 80, String(i));
    cache.set("s10", 80, "10");
    expect(cache.size).toBe(10);
    expect(cache.get("s0", 80)).toBeUndefined();
    expect(cache.get("s1", 80)).toBe("1");
    expect(cache.get("s10", 80)).toBe("10");
  });
});
