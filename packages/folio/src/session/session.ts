/**
 * ViewerSession — one viewer's engine bound to one screen.
 *
 * Events (keys, resizes, clock ticks) are dispatched one at a time and the
 * frame is flushed before the call returns. close() is idempotent and stops
 * the clock, so no timer fires into a closed session.
 */

import { type Logger, silentLogger } from "termfolio-core";
import { type Screen, TerminalWriter } from "termfolio-tui";
import { splitKeys } from "../keymap.js";
import type { Action, Outcome } from "../types.js";
import type { PortfolioApp } from "../ui/app.js";

export const CLOCK_INTERVAL_MS = 1000;

export interface ViewerSessionOptions {
  /** Shown in log lines, e.g. the client address. */
  label: string;
  app: PortfolioApp;
  screen: Screen;
  /** Drive the navbar clock with a tick every second. */
  clock?: boolean;
  logger?: Logger;
  now?: () => Date;
  onClose?: (session: ViewerSession) => void;
}

export class ViewerSession {
  readonly label: string;
  private readonly app: PortfolioApp;
  private readonly writer: TerminalWriter;
  private readonly log: Logger;
  private readonly now: () => Date;
  private timer: ReturnType<typeof setInterval> | null = null;
  private closed = false;

  constructor(private readonly options: ViewerSessionOptions) {
    this.label = options.label;
    this.app = options.app;
    this.writer = new TerminalWriter(options.screen);
    this.log = (options.logger ?? silentLogger).child(`session:${options.label}`);
    this.now = options.now ?? (() => new Date());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Take over the screen and draw the first frame. */
  start(): void {
    if (this.closed) return;
    this.writer.enterAltScreen();
    this.log.info("Session started");

    if (this.options.clock) {
      this.app.dispatch({ type: "tick", now: this.now() });
      this.timer = setInterval(() => this.dispatch({ type: "tick", now: this.now() }), CLOCK_INTERVAL_MS);
    }
    this.dispatch({ type: "resize", width: this.options.screen.columns, height: this.options.screen.rows });
  }

  /** Feed raw terminal input. */
  input(data: string): void {
    for (const key of splitKeys(data)) {
      if (this.closed) return;
      this.apply(this.app.handleInput(key));
    }
  }

  resize(width: number, height: number): void {
    this.dispatch({ type: "resize", width, height });
  }

  dispatch(action: Action): void {
    if (this.closed) return;
    this.apply(this.app.dispatch(action));
  }

  close(reason = "quit"): void {
    if (this.closed) return;
    this.closed = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.writer.exitAltScreen();
    this.log.info(`Session closed (${reason})`);
    this.options.onClose?.(this);
  }

  private apply(outcome: Outcome): void {
    if (outcome === "quit") {
      this.close();
    } else if (outcome === "redraw") {
      this.writer.drawFrame(this.app.render());
    }
  }
}

/** Live sessions, bounded by `maxSessions`. */
export class SessionRegistry {
  private readonly sessions = new Set<ViewerSession>();

  constructor(readonly maxSessions: number) {}

  get size(): number {
    return this.sessions.size;
  }

  get isFull(): boolean {
    return this.sessions.size >= this.maxSessions;
  }

  /** Track a session. Returns false when the registry is full. */
  add(session: ViewerSession): boolean {
    if (this.isFull) return false;
    this.sessions.add(session);
    return true;
  }

  remove(session: ViewerSession): void {
    this.sessions.delete(session);
  }

  closeAll(reason = "shutdown"): void {
    for (const session of [...this.sessions]) {
      session.close(reason);
    }
    this.sessions.clear();
  }
}
