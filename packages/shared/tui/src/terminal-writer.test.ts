import { describe, expect, it } from "vitest";
import { type Screen, TerminalWriter } from "./terminal-writer.js";

class FakeScreen implements Screen {
  writes: string[] = [];
  constructor(
    public columns: number,
    public rows: number
  ) {}
  write(data: string): void {
    this.writes.push(data);
  }
}

describe("TerminalWriter", () => {
  it("buffers until flush", () => {
    const screen = new FakeScreen(10, 2);
    const writer = new TerminalWriter(screen);
    writer.write("a");
    writer.write("b");
    expect(screen.writes).toEqual([]);
    writer.flush();
    expect(screen.writes).toEqual(["ab"]);
    writer.flush();
    expect(screen.writes).toEqual(["ab"]);
  });

  it("draws a frame row by row in one write, blanking missing rows", () => {
    const screen = new FakeScreen(10, 3);
    new TerminalWriter(screen).drawFrame(["top", "mid"]);
    expect(screen.writes).toEqual([
      "\x1b[1;1H\x1b[2Ktop\x1b[0m" + "\x1b[2;1H\x1b[2Kmid\x1b[0m" + "\x1b[3;1H\x1b[2K\x1b[0m",
    ]);
  });

  it("never draws past the last screen row", () => {
    const screen = new FakeScreen(10, 1);
    new TerminalWriter(screen).drawFrame(["one", "two"]);
    expect(screen.writes).toEqual(["\x1b[1;1H\x1b[2Kone\x1b[0m"]);
  });

  it("wraps alt-screen enter and exit", () => {
    const screen = new FakeScreen(10, 1);
    const writer = new TerminalWriter(screen);
    writer.enterAltScreen();
    writer.exitAltScreen();
    expect(screen.writes).toEqual([
      "\x1b[?1049h\x1b[?25l\x1b[2J\x1b[H",
      "\x1b[0m\x1b[?1049l\x1b[?25h",
    ]);
  });

  it("reports at least one row and column", () => {
    const writer = new TerminalWriter(new FakeScreen(0, 0));
    expect(writer.rows).toBe(1);
    expect(writer.cols).toBe(1);
  });
});
