/**
 * Viewport — a scrollable window over pre-rendered lines.
 *
 * Knows nothing about pages; it only tracks content, window height and the
 * offset of the first visible line, kept within [0, maxOffset].
 */

import { padToWidth } from "termfolio-tui";

export class Viewport {
  private lines: readonly string[] = [];
  private _offset = 0;
  private _height = 0;

  get offset(): number {
    return this._offset;
  }

  get height(): number {
    return this._height;
  }

  get totalLines(): number {
    return this.lines.length;
  }

  get maxOffset(): number {
    return Math.max(0, this.lines.length - this._height);
  }

  /** Replace the content. The offset is clamped, not reset. */
  setContent(lines: readonly string[]): void {
    this.lines = lines;
    this.setOffset(this._offset);
  }

  setHeight(height: number): void {
    this._height = Math.max(0, height);
    this.setOffset(this._offset);
  }

  setOffset(offset: number): void {
    this._offset = Math.min(Math.max(0, offset), this.maxOffset);
  }

  /** Scroll by `delta` lines. Returns whether the offset moved. */
  scrollBy(delta: number): boolean {
    const before = this._offset;
    this.setOffset(before + delta);
    return this._offset !== before;
  }

  gotoTop(): void {
    this._offset = 0;
  }

  gotoBottom(): void {
    this._offset = this.maxOffset;
  }

  /** Exactly `height` rows, each padded or truncated to `width`. */
  visibleLines(width: number): string[] {
    const rows: string[] = [];
    for (let i = 0; i < this._height; i++) {
      rows.push(padToWidth(this.lines[this._offset + i] ?? "", width));
    }
    return rows;
  }
}
