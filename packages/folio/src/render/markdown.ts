/**
 * Render adapter: Markdown in, styled terminal text out.
 *
 * The width handed to the renderer leaves room for the content padding and
 * never drops below a readable floor. A renderer failure returns the source
 * text unchanged.
 */

import { Markdown, type MarkdownTheme } from "@mariozechner/pi-tui";
import { type Logger, errorMessage, silentLogger } from "termfolio-core";

export const MIN_RENDER_WIDTH = 40;
export const RENDER_PADDING = 8;

export function effectiveWidth(width: number): number {
  return Math.max(MIN_RENDER_WIDTH, width - RENDER_PADDING);
}

/** Turns Markdown into lines no wider than `width`. */
export type MarkdownBuilder = (markdown: string, width: number, theme: MarkdownTheme) => string[];

export const piTuiBuilder: MarkdownBuilder = (markdown, width, theme) =>
  new Markdown(markdown, 0, 0, theme).render(width);

export interface MarkdownRenderer {
  render(markdown: string, width: number): string;
}

export interface MarkdownRendererOptions {
  theme: MarkdownTheme;
  build?: MarkdownBuilder;
  logger?: Logger;
}

export function createMarkdownRenderer(options: MarkdownRendererOptions): MarkdownRenderer {
  const build = options.build ?? piTuiBuilder;
  const log = options.logger ?? silentLogger;

  return {
    render(markdown, width) {
      try {
        return build(markdown, effectiveWidth(width), options.theme)
          .map((line) => line.trimEnd())
          .join("\n");
      } catch (err) {
        log.debug(`Markdown render failed, showing source: ${errorMessage(err)}`);
        return markdown;
      }
    },
  };
}
