/**
 * Session styles.
 *
 * Built from a colour level each time a session needs them; there is no
 * shared style object to mutate on resize. With colour off every style is
 * the identity, except the active navbar item which is bracketed.
 */

import type { MarkdownTheme } from "@mariozechner/pi-tui";
import { type ColorLevel, type RGB, createPaint, hexToRgb } from "termfolio-tui";

export const PALETTE = {
  primary: hexToRgb("#7D56F4"),
  text: hexToRgb("#FAFAFA"),
  accent: hexToRgb("#F25D94"),
  muted: hexToRgb("#626262"),
  footerBg: hexToRgb("#1a1a1a"),
  highlightBg: hexToRgb("#2a2a2a"),
} satisfies Record<string, RGB>;

export interface Styles {
  readonly level: ColorLevel;
  /** Navbar background fill: bold light text on the primary colour. */
  bar(text: string): string;
  navActive(label: string): string;
  navInactive(label: string): string;
  footer(text: string): string;
  cardBorder(selected: boolean, text: string): string;
  cardFill(selected: boolean, text: string): string;
  title(text: string): string;
  muted(text: string): string;
  readonly markdown: MarkdownTheme;
}

export function createStyles(level: ColorLevel): Styles {
  const paint = createPaint(level);
  const colored = level !== "none";

  const fg = (color: RGB) => (text: string) => paint.fg(color, text);

  return {
    level,
    bar: (text) => paint.bg(PALETTE.primary, paint.fg(PALETTE.text, paint.bold(text))),
    navActive: (label) =>
      colored
        ? paint.bg(PALETTE.text, paint.fg(PALETTE.primary, paint.bold(` ${label} `)))
        : `[${label}]`,
    navInactive: (label) => paint.bg(PALETTE.primary, paint.fg(PALETTE.text, ` ${label} `)),
    footer: (text) => paint.bg(PALETTE.footerBg, paint.fg(PALETTE.muted, text)),
    cardBorder: (selected, text) => paint.fg(selected ? PALETTE.accent : PALETTE.primary, text),
    cardFill: (selected, text) => (selected ? paint.bg(PALETTE.highlightBg, text) : text),
    title: (text) => paint.bold(text),
    muted: fg(PALETTE.muted),
    markdown: {
      heading: (text) => paint.bold(paint.fg(PALETTE.primary, text)),
      link: fg(PALETTE.accent),
      linkUrl: fg(PALETTE.muted),
      code: fg(PALETTE.accent),
      codeBlock: fg(PALETTE.text),
      codeBlockBorder: fg(PALETTE.muted),
      quote: (text) => paint.italic(text),
      quoteBorder: fg(PALETTE.muted),
      hr: fg(PALETTE.muted),
      listBullet: fg(PALETTE.primary),
      bold: (text) => paint.bold(text),
      italic: (text) => paint.italic(text),
      strikethrough: (text) => paint.strikethrough(text),
      underline: (text) => paint.underline(text),
    },
  };
}
