import { matchesKey } from "@mariozechner/pi-tui";
import type { Action } from "./types.js";

/** First and second key of the go-to-top chord. */
export const TOP_CHORD_KEY = "g";

/**
 * Map raw terminal input to a logical action.
 *
 * Arrows and vim letters alias each other; anything unbound is `other`,
 * which still breaks a pending chord.
 */
export function keyToAction(data: string): Action {
  if (matchesKey(data, "q") || matchesKey(data, "ctrl+c")) return { type: "quit" };

  if (matchesKey(data, "left") || matchesKey(data, "h")) return { type: "left" };
  if (matchesKey(data, "right") || matchesKey(data, "l")) return { type: "right" };
  if (matchesKey(data, "up") || matchesKey(data, "k")) return { type: "up" };
  if (matchesKey(data, "down") || matchesKey(data, "j")) return { type: "down" };

  if (matchesKey(data, "return") || matchesKey(data, "enter")) return { type: "confirm" };
  if (matchesKey(data, "backspace") || matchesKey(data, "escape")) return { type: "back" };

  if (matchesKey(data, "ctrl+u")) return { type: "halfPageUp" };
  if (matchesKey(data, "ctrl+d")) return { type: "halfPageDown" };
  if (matchesKey(data, "pageUp")) return { type: "pageUp" };
  if (matchesKey(data, "pageDown")) return { type: "pageDown" };

  if (data === "G" || matchesKey(data, "shift+g") || matchesKey(data, "end")) return { type: "bottom" };
  if (matchesKey(data, "home")) return { type: "top" };
  if (matchesKey(data, TOP_CHORD_KEY)) return { type: "chord", key: TOP_CHORD_KEY };

  return { type: "other" };
}

/**
 * One key per match: a CSI sequence up to its final byte, an SS3 sequence,
 * Escape with at most one following character, or a single code point.
 */
const KEY_PATTERN = /\x1b\[[0-?]*[ -/]*[@-~]|\x1bO[\s\S]|\x1b[\s\S]?|[\s\S]/gu;

/**
 * Split one chunk of terminal input into keys. A fast typist or a paste can
 * deliver several keys at once, escape sequences included.
 */
export function splitKeys(data: string): string[] {
  return data.match(KEY_PATTERN) ?? [];
}
