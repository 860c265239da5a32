/**
 * Core domain types for the portfolio viewer.
 */

export type PageId = "home" | "projects" | "blog" | "about" | "contact";

/** Pages whose body is a static Markdown document. */
export type StaticPageId = Extract<PageId, "home" | "about" | "contact">;

export interface Post {
  /** File name without extension; unique within a content directory. */
  id: string;
  title: string;
  summary: string;
  /** Raw Markdown body. */
  body: string;
  date: Date;
  /** `date` as YYYY-MM-DD, for display. */
  dateLabel: string;
  published: boolean;
  tags: string[];
  readTime: string;
  author: string;
}

export interface Project {
  name: string;
  description: string;
  technologies: string[];
  features: string[];
  status: string;
  url?: string;
}

/**
 * Logical input actions. Key bindings map raw terminal input onto these;
 * several physical keys may alias one action.
 */
export type Action =
  | { type: "resize"; width: number; height: number }
  | { type: "left" }
  | { type: "right" }
  | { type: "up" }
  | { type: "down" }
  | { type: "confirm" }
  | { type: "back" }
  | { type: "quit" }
  | { type: "halfPageUp" }
  | { type: "halfPageDown" }
  | { type: "pageUp" }
  | { type: "pageDown" }
  | { type: "chord"; key: string }
  | { type: "top" }
  | { type: "bottom" }
  | { type: "tick"; now: Date }
  /** A key with no binding. Still cancels a pending chord. */
  | { type: "other" };

export type ActionType = Action["type"];

/** What the session should do after an action was dispatched. */
export type Outcome = "redraw" | "idle" | "quit";
