import { truncateToWidth, visibleWidth, wrapTextWithAnsi } from "@mariozechner/pi-tui";

/** Pad or truncate text to exactly `width` visible columns. */
export function padToWidth(text: string, width: number): string {
  if (width <= 0) return "";
  const truncated = visibleWidth(text) > width ? truncateToWidth(text, width, "") : text;
  const pad = width - visibleWidth(truncated);
  return pad > 0 ? truncated + " ".repeat(pad) : truncated;
}

/**
 * Word-wrap text (ANSI-aware) into lines of at most `width` columns.
 * Explicit newlines are kept; a non-positive width yields one empty line.
 */
export function wrapToWidth(text: string, width: number): string[] {
  if (width <= 0) return [""];
  const lines = wrapTextWithAnsi(text, width);
  return lines.length > 0 ? lines : [""];
}
