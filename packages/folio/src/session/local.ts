/**
 * Local mode: a single session on the invoking terminal.
 */

import type { Logger } from "termfolio-core";
import type { Screen } from "termfolio-tui";
import type { PortfolioApp } from "../ui/app.js";
import { ViewerSession } from "./session.js";

const FALLBACK_COLUMNS = 80;
const FALLBACK_ROWS = 24;

/** The parts of stdin a local session uses. */
export interface LocalInput {
  readonly isTTY?: boolean;
  setRawMode(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: "data", listener: (data: Buffer | string) => void): unknown;
  off(event: "data", listener: (data: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/** The parts of stdout a local session uses. */
export interface LocalOutput {
  readonly columns?: number;
  readonly rows?: number;
  write(data: string): unknown;
  on(event: "resize", listener: () => void): unknown;
  off(event: "resize", listener: () => void): unknown;
}

export interface LocalRunOptions {
  app: PortfolioApp;
  clock: boolean;
  logger: Logger;
  stdin?: LocalInput;
  stdout?: LocalOutput;
}

/** Run one session on stdin/stdout. Resolves when the session closes. */
export function runLocal(options: LocalRunOptions): Promise<void> {
  const stdin: LocalInput = options.stdin ?? process.stdin;
  const stdout: LocalOutput = options.stdout ?? process.stdout;

  const screen: Screen = {
    write: (data) => {
      stdout.write(data);
    },
    get columns() {
      return stdout.columns ?? FALLBACK_COLUMNS;
    },
    get rows() {
      return stdout.rows ?? FALLBACK_ROWS;
    },
  };

  return new Promise((resolve) => {
    const onData = (data: Buffer | string) => session.input(data.toString());
    const onResize = () => session.resize(screen.columns, screen.rows);
    const onSignal = (signal: NodeJS.Signals) => session.close(signal);

    const session = new ViewerSession({
      label: "local",
      app: options.app,
      screen,
      clock: options.clock,
      logger: options.logger,
      onClose: () => {
        stdin.off("data", onData);
        stdout.off("resize", onResize);
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
        if (stdin.isTTY) stdin.setRawMode(false);
        stdin.pause();
        resolve();
      },
    });

    if (stdin.isTTY) stdin.setRawMode(true);
    stdin.setEncoding("utf8");
    stdin.on("data", onData);
    stdin.resume();
    stdout.on("resize", onResize);
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    session.start();
  });
}
