/**
 * View building blocks. Everything here is a pure function of its inputs:
 * page state, terminal width and the session styles.
 */

import { truncateToWidth, visibleWidth } from "@mariozechner/pi-tui";
import { padToWidth, wrapToWidth } from "termfolio-tui";
import { PAGES } from "../pages.js";
import type { Styles } from "../render/theme.js";
import type { PageId, Post, Project } from "../types.js";

export const NAVBAR_ROWS = 3;
export const FOOTER_ROWS = 1;
/** Rows taken by the navbar and footer around the viewport. */
export const CHROME_ROWS = NAVBAR_ROWS + FOOTER_ROWS;

export const PLACEHOLDER = "Loading...";

const CONTENT_INDENT = "  ";

// =============================================================================
// STATUS LINE
// =============================================================================

const STATUS_READING = "📖 Reading blog post • ↑/↓ PgUp/PgDn to scroll • Backspace to return • q/Ctrl+C to quit";
const STATUS_BLOG = "📚 Blog posts • ↑/↓ navigate • Enter to read • ←/→ change page • q/Ctrl+C to quit";
const STATUS_DEFAULT = "🧭 Portfolio navigation • ←/→ navigate pages • ↑/↓ scroll content • q/Ctrl+C to quit";

export function statusText(page: PageId, viewingDetail: boolean): string {
  if (viewingDetail) return STATUS_READING;
  return page === "blog" ? STATUS_BLOG : STATUS_DEFAULT;
}

export function renderFooter(page: PageId, viewingDetail: boolean, width: number, styles: Styles): string {
  return styles.footer(padToWidth(`${CONTENT_INDENT}${statusText(page, viewingDetail)}`, width));
}

// =============================================================================
// NAVBAR
// =============================================================================

export interface NavbarModel {
  title: string;
  page: PageId;
  /** Shown right-aligned when set. */
  clock?: Date;
}

/** Local wall-clock time as HH:MM:SS. */
export function formatClock(date: Date): string {
  const two = (n: number) => String(n).padStart(2, "0");
  return `${two(date.getHours())}:${two(date.getMinutes())}:${two(date.getSeconds())}`;
}

export function renderNavbar(model: NavbarModel, width: number, styles: Styles): string[] {
  const blank = styles.bar(" ".repeat(width));
  const items = PAGES.map((p) => (p.id === model.page ? styles.navActive(p.label) : styles.navInactive(p.label)));
  const left = styles.bar(`${CONTENT_INDENT}📍 ${model.title}  |  `) + items.join("");
  const right = model.clock ? styles.bar(`${formatClock(model.clock)}${CONTENT_INDENT}`) : "";

  return [blank, fillRow(left, right, width, styles), blank];
}

function fillRow(left: string, right: string, width: number, styles: Styles): string {
  const leftWidth = visibleWidth(left);
  const gap = width - leftWidth - visibleWidth(right);
  if (right && gap >= 1) return left + styles.bar(" ".repeat(gap)) + right;
  if (leftWidth <= width) return left + styles.bar(" ".repeat(width - leftWidth));
  return truncateToWidth(left, width, "");
}

// =============================================================================
// CONTENT
// =============================================================================

/** Blank line above and below, content indented two columns. */
export function padContent(text: string): string[] {
  return ["", ...text.split("\n").map((line) => CONTENT_INDENT + line), ""];
}

export function cardWidth(width: number): number {
  return Math.min(72, Math.max(24, width - 8));
}

export function renderCard(post: Post, selected: boolean, width: number, styles: Styles): string[] {
  const w = cardWidth(width);
  const inner = w - 4;
  const border = (text: string) => styles.cardBorder(selected, text);
  const marker = selected ? "▸ " : "";

  const body = [
    styles.title(`${marker}📝 ${post.title}`),
    "",
    ...wrapToWidth(post.summary, inner),
    "",
    styles.muted(`📅 ${post.dateLabel}`),
  ];

  return [
    border(`╭${"─".repeat(w - 2)}╮`),
    ...body.map((line) => border("│") + styles.cardFill(selected, ` ${padToWidth(line, inner)} `) + border("│")),
    border(`╰${"─".repeat(w - 2)}╯`),
  ];
}

export const BLOG_HEADER = ["📚 Blog Posts", "", "Use ↑/↓ to navigate posts, Enter to read, scroll within posts"];

/** The blog index: header, then one card per post separated by blank lines. */
export function blogIndexText(posts: readonly Post[], selectedIndex: number, width: number, styles: Styles): string {
  const lines = [...BLOG_HEADER];
  posts.forEach((post, i) => {
    lines.push("", ...renderCard(post, i === selectedIndex, width, styles));
  });
  return lines.join("\n");
}

/** Title and metadata shown above a post body. */
export function postHeaderLines(post: Post, styles: Styles): string[] {
  const meta = [`📅 ${post.dateLabel}`];
  if (post.readTime) meta.push(`⌛ ${post.readTime}`);
  if (post.author) meta.push(`👤 ${post.author}`);

  const lines = [styles.title(`📝 ${post.title}`), meta.join(" • ")];
  if (post.tags.length > 0) {
    lines.push(styles.muted(`🔖 ${post.tags.map((t) => `#${t}`).join(" ")}`));
  }
  return lines;
}

export function projectsMarkdown(projects: readonly Project[]): string {
  const out: string[] = [
    "# 🛠️ Featured Projects",
    "",
    "Here are some of my notable projects and contributions:",
    "",
  ];

  projects.forEach((project, i) => {
    out.push(`## ${i + 1}. ${project.name}`, "", `**Description:** ${project.description}`, "");

    out.push("**Technologies:**", ...project.technologies.map((t) => `- ${t}`), "");
    if (project.features.length > 0) {
      out.push("**Key Features:**", ...project.features.map((f) => `- ${f}`), "");
    }

    out.push(`**Status:** ${project.status}`);
    if (project.url) {
      out.push("", `**Repository:** [${project.url}](${project.url})`);
    }
    out.push("", "---", "");
  });

  out.push(
    "## 🔗 Links",
    "",
    "Repository links above lead to source code and documentation.",
    "",
    "🚀 Always working on something new!"
  );
  return out.join("\n");
}
