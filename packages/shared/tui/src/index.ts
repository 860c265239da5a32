export * as ansi from "./ansi.js";
export {
  type ColorLevel,
  type Paint,
  type RGB,
  createPaint,
  detectColorLevel,
  hexToRgb,
  rgbTo256,
} from "./color.js";
export { RenderCache } from "./render-cache.js";
export { type Screen, TerminalWriter } from "./terminal-writer.js";
export { padToWidth, wrapToWidth } from "./text-utils.js";
