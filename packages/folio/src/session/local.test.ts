import { EventEmitter } from "node:events";
import { silentLogger } from "termfolio-core";
import { ansi } from "termfolio-tui";
import { describe, expect, it } from "vitest";
import type { ContentProvider } from "../content/provider.js";
import { PortfolioApp } from "../ui/app.js";
import { type LocalInput, type LocalOutput, runLocal } from "./local.js";

class FakeInput extends EventEmitter implements LocalInput {
  isTTY = true;
  rawMode = false;
  paused = true;
  encoding: BufferEncoding | null = null;

  setRawMode(mode: boolean): this {
    this.rawMode = mode;
    return this;
  }

  setEncoding(encoding: BufferEncoding): this {
    this.encoding = encoding;
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }
}

class FakeOutput extends EventEmitter implements LocalOutput {
  output = "";
  columns: number | undefined = 100;
  rows: number | undefined = 30;

  write(data: string): boolean {
    this.output += data;
    return true;
  }
}

const content: ContentProvider = {
  listPosts: () => [],
  listProjects: () => [],
  pageMarkdown: (page) => Array.from({ length: 40 }, (_, i) => `${page} line ${i}`).join("\n"),
};

function makeApp(): PortfolioApp {
  return new PortfolioApp({
    content,
    title: "Local Folio",
    colorLevel: "none",
    renderer: { render: (markdown) => markdown },
  });
}

function start(input = new FakeInput(), output = new FakeOutput()) {
  const app = makeApp();
  const done = runLocal({ app, clock: false, logger: silentLogger, stdin: input, stdout: output });
  return { app, input, output, done };
}

describe("runLocal", () => {
  it("takes over the terminal and draws the first frame", async () => {
    const { app, input, output, done } = start();

    expect(input.rawMode).toBe(true);
    expect(input.paused).toBe(false);
    expect(input.encoding).toBe("utf8");
    expect(output.output.startsWith(ansi.ENTER_ALT_SCREEN)).toBe(true);
    expect(output.output).toContain("📍 Local Folio");
    expect(app.snapshot()).toMatchObject({ ready: true, width: 100, height: 30 });

    input.emit("data", "q");
    await done;
  });

  it("dispatches input and resolves once the viewer quits", async () => {
    const { app, input, output, done } = start();

    input.emit("data", "jj");
    expect(app.snapshot().offset).toBe(2);

    input.emit("data", "q");
    await done;

    expect(input.rawMode).toBe(false);
    expect(input.paused).toBe(true);
    expect(input.listenerCount("data")).toBe(0);
    expect(output.listenerCount("resize")).toBe(0);
    expect(output.output.endsWith(ansi.RESET + ansi.EXIT_ALT_SCREEN + ansi.SHOW_CURSOR)).toBe(true);
  });

  it("follows terminal resizes", async () => {
    const { app, input, output, done } = start();

    output.columns = 120;
    output.rows = 40;
    output.emit("resize");
    expect(app.snapshot()).toMatchObject({ width: 120, height: 40 });

    input.emit("data", "q");
    await done;
  });

  it("falls back to 80x24 when the terminal size is unknown", async () => {
    const output = new FakeOutput();
    output.columns = undefined;
    output.rows = undefined;
    const { app, input, done } = start(new FakeInput(), output);

    expect(app.snapshot()).toMatchObject({ width: 80, height: 24 });

    input.emit("data", "q");
    await done;
  });

  it("leaves raw mode alone when stdin is not a terminal", async () => {
    const input = new FakeInput();
    input.isTTY = false;
    const { done } = start(input);

    expect(input.rawMode).toBe(false);

    input.emit("data", "q");
    await done;
    expect(input.paused).toBe(true);
  });

  it("removes its signal handlers on close", async () => {
    const before = process.listenerCount("SIGINT");
    const { input, done } = start();
    expect(process.listenerCount("SIGINT")).toBe(before + 1);
    expect(process.listenerCount("SIGTERM")).toBeGreaterThan(0);

    input.emit("data", "q");
    await done;
    expect(process.listenerCount("SIGINT")).toBe(before);
  });
});
