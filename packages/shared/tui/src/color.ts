/**
 * Colour levels and painters.
 *
 * A Paint turns text into styled text for one colour level. Nothing here is
 * global: every session builds its own painter from the level it negotiated.
 */
import * as ansi from "./ansi.js";

export type ColorLevel = "truecolor" | "ansi256" | "none";

export type RGB = readonly [number, number, number];

export function hexToRgb(hex: string): RGB {
  const m = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!m) throw new Error(`Invalid hex colour: ${hex}`);
  return [Number.parseInt(m[1], 16), Number.parseInt(m[2], 16), Number.parseInt(m[3], 16)];
}

/** Nearest xterm-256 palette index (6×6×6 cube, or the grey ramp for greys). */
export function rgbTo256([r, g, b]: RGB): number {
  if (r === g && g === b) {
    if (r < 8) return 16;
    if (r > 248) return 231;
    return 232 + Math.round(((r - 8) / 247) * 24);
  }
  const q = (v: number) => Math.round((v / 255) * 5);
  return 16 + 36 * q(r) + 6 * q(g) + q(b);
}

/**
 * Pick a colour level from a terminal environment.
 * NO_COLOR and dumb terminals get no colour; COLORTERM announces truecolor.
 */
export function detectColorLevel(env: Record<string, string | undefined>): ColorLevel {
  if (env.NO_COLOR) return "none";
  if (env.TERM === "dumb") return "none";
  const colorterm = env.COLORTERM?.toLowerCase();
  if (colorterm === "truecolor" || colorterm === "24bit") return "truecolor";
  return "ansi256";
}

export interface Paint {
  readonly level: ColorLevel;
  fg(color: RGB, text: string): string;
  bg(color: RGB, text: string): string;
  bold(text: string): string;
  italic(text: string): string;
  underline(text: string): string;
  strikethrough(text: string): string;
}

export function createPaint(level: ColorLevel): Paint {
  if (level === "none") {
    const plain = (text: string) => text;
    return {
      level,
      fg: (_color, text) => text,
      bg: (_color, text) => text,
      bold: plain,
      italic: plain,
      underline: plain,
      strikethrough: plain,
    };
  }

  const fgCode = (c: RGB) => (level === "truecolor" ? ansi.fg24(...c) : ansi.fg256(rgbTo256(c)));
  const bgCode = (c: RGB) => (level === "truecolor" ? ansi.bg24(...c) : ansi.bg256(rgbTo256(c)));

  return {
    level,
    fg: (color, text) => `${fgCode(color)}${text}${ansi.RESET_FG}`,
    bg: (color, text) => `${bgCode(color)}${text}${ansi.RESET_BG}`,
    bold: (text) => `${ansi.BOLD}${text}${ansi.NORMAL_INTENSITY}`,
    italic: (text) => `${ansi.ITALIC}${text}${ansi.NO_ITALIC}`,
    underline: (text) => `${ansi.UNDERLINE}${text}${ansi.NO_UNDERLINE}`,
    strikethrough: (text) => `${ansi.STRIKETHROUGH}${text}${ansi.NO_STRIKETHROUGH}`,
  };
}
