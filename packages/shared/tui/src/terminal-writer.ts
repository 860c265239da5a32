/**
 * TerminalWriter — Buffered, cursor-addressed terminal write helper.
 *
 * Wraps a Screen (local stdout or a remote SSH channel) to provide:
 *   - Buffered writes (batch multiple operations, flush once)
 *   - Whole-frame redraws addressed row by row
 *   - Alt-screen lifecycle management
 *
 * All writes accumulate in an internal buffer until flush() is called,
 * producing a single write on the underlying stream per frame.
 */

import * as ansi from "./ansi.js";

/** Anything that accepts terminal output and knows its size. */
export interface Screen {
  write(data: string): void;
  readonly columns: number;
  readonly rows: number;
}

export class TerminalWriter {
  private buf = "";

  constructor(private readonly screen: Screen) {}

  // ── Buffered output ────────────────────────────────────────────────

  /** Append raw data to the write buffer. */
  write(data: string): void {
    this.buf += data;
  }

  /** Flush the buffer to the screen in a single write. */
  flush(): void {
    if (this.buf.length > 0) {
      this.screen.write(this.buf);
      this.buf = "";
    }
  }

  // ── Cursor-addressed writes ────────────────────────────────────────

  /** Clear a row and write content at its first column (1-indexed row). */
  writeLine(row: number, content: string): void {
    this.write(ansi.moveTo(row, 1) + ansi.CLEAR_LINE + content + ansi.RESET);
  }

  /**
   * Redraw every screen row from `lines`, blanking rows past the end.
   * Lines beyond the screen height are not drawn.
   */
  drawFrame(lines: readonly string[]): void {
    for (let row = 1; row <= this.rows; row++) {
      this.writeLine(row, lines[row - 1] ?? "");
    }
    this.flush();
  }

  // ── Alt-screen lifecycle ───────────────────────────────────────────

  /** Enter alternate screen buffer, hide cursor, clear screen. */
  enterAltScreen(): void {
    this.write(ansi.ENTER_ALT_SCREEN + ansi.HIDE_CURSOR + ansi.CLEAR_SCREEN + ansi.HOME);
    this.flush();
  }

  /** Exit alternate screen buffer, restore cursor. */
  exitAltScreen(): void {
    this.write(ansi.RESET + ansi.EXIT_ALT_SCREEN + ansi.SHOW_CURSOR);
    this.flush();
  }

  // ── Terminal dimensions ────────────────────────────────────────────

  get rows(): number {
    return Math.max(1, this.screen.rows);
  }

  get cols(): number {
    return Math.max(1, this.screen.columns);
  }
}
