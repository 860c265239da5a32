/**
 * PortfolioApp — navigation and viewport engine for one viewer.
 *
 * Layout (top to bottom):
 *   Navbar:   3 rows, page tabs and optional clock
 *   Viewport: height - 4 rows of scrollable page content
 *   Footer:   1 status row for the current page
 *
 * Every input is a logical Action handled to completion before the next
 * one. dispatch() reports whether the frame needs redrawing; render()
 * returns the frame. Until the first resize the frame is a placeholder.
 */

import { type Logger, silentLogger } from "termfolio-core";
import { type ColorLevel, RenderCache } from "termfolio-tui";
import type { ContentProvider } from "../content/provider.js";
import { keyToAction } from "../keymap.js";
import { FIRST_PAGE, nextPage, previousPage } from "../pages.js";
import { type MarkdownRenderer, createMarkdownRenderer } from "../render/markdown.js";
import { type Styles, createStyles } from "../render/theme.js";
import type { Action, Outcome, PageId, Post } from "../types.js";
import {
  CHROME_ROWS,
  PLACEHOLDER,
  blogIndexText,
  padContent,
  postHeaderLines,
  projectsMarkdown,
  renderFooter,
  renderNavbar,
} from "./view.js";
import { Viewport } from "./viewport.js";

/** Lines moved by a half-page jump. */
export const HALF_PAGE_LINES = 10;

/** Actions that reach the engine once it has geometry. */
type KeyAction = Exclude<Action, { type: "quit" | "resize" | "tick" }>;

export interface PortfolioAppOptions {
  content: ContentProvider;
  title: string;
  colorLevel: ColorLevel;
  /** Show a clock in the navbar, driven by tick actions. */
  clock?: boolean;
  /** Defaults to the pi-tui Markdown renderer with this session's theme. */
  renderer?: MarkdownRenderer;
  logger?: Logger;
}

/** Read-only view of the navigation state, for sessions and tests. */
export interface AppSnapshot {
  ready: boolean;
  width: number;
  height: number;
  page: PageId;
  viewingDetail: boolean;
  selectedIndex: number;
  pendingChord: string | null;
  offset: number;
  maxOffset: number;
  totalLines: number;
}

export class PortfolioApp {
  private page: PageId = FIRST_PAGE;
  private viewingDetail = false;
  private selectedIndex = 0;
  private pendingChord: string | null = null;

  private ready = false;
  private width = 0;
  private height = 0;
  private now: Date | null = null;

  private posts: readonly Post[];
  private readonly viewport = new Viewport();
  private readonly cache = new RenderCache(64);
  private readonly styles: Styles;
  private readonly renderer: MarkdownRenderer;
  private readonly log: Logger;

  constructor(private readonly options: PortfolioAppOptions) {
    this.log = (options.logger ?? silentLogger).child("app");
    this.styles = createStyles(options.colorLevel);
    this.renderer =
      options.renderer ?? createMarkdownRenderer({ theme: this.styles.markdown, logger: this.log });
    this.posts = options.content.listPosts();
  }

  snapshot(): AppSnapshot {
    return {
      ready: this.ready,
      width: this.width,
      height: this.height,
      page: this.page,
      viewingDetail: this.viewingDetail,
      selectedIndex: this.selectedIndex,
      pendingChord: this.pendingChord,
      offset: this.viewport.offset,
      maxOffset: this.viewport.maxOffset,
      totalLines: this.viewport.totalLines,
    };
  }

  /** Replace the post list, keeping the selection in range. */
  setPosts(posts: readonly Post[]): void {
    this.posts = posts;
    this.clampSelection();
    if (posts.length === 0) this.viewingDetail = false;
    if (this.ready) this.reload(true);
  }

  // ── Input ───────────────────────────────────────────────────────────

  handleInput(data: string): Outcome {
    return this.dispatch(keyToAction(data));
  }

  dispatch(action: Action): Outcome {
    if (action.type === "quit") return "quit";
    if (action.type === "resize") return this.resize(action.width, action.height);
    if (action.type === "tick") {
      this.now = action.now;
      return this.ready && this.options.clock ? "redraw" : "idle";
    }
    if (!this.ready) return "idle";

    if (this.pendingChord !== null) {
      const pending = this.pendingChord;
      this.pendingChord = null;
      if (action.type === "chord" && action.key === pending) return this.gotoTop();
    }
    return this.handleKey(action);
  }

  private handleKey(action: KeyAction): Outcome {
    switch (action.type) {
      case "chord":
        this.pendingChord = action.key;
        return "idle";
      case "left":
        return this.viewingDetail ? "idle" : this.goToPage(previousPage(this.page));
      case "right":
        return this.viewingDetail ? "idle" : this.goToPage(nextPage(this.page));
      case "up":
        return this.onBlogIndex() ? this.select(this.selectedIndex - 1) : this.scroll(-1);
      case "down":
        return this.onBlogIndex() ? this.select(this.selectedIndex + 1) : this.scroll(1);
      case "confirm":
        return this.openPost();
      case "back":
        return this.closePost();
      case "halfPageUp":
        return this.scroll(-HALF_PAGE_LINES);
      case "halfPageDown":
        return this.scroll(HALF_PAGE_LINES);
      case "pageUp":
        return this.scroll(-Math.max(1, this.viewport.height));
      case "pageDown":
        return this.scroll(Math.max(1, this.viewport.height));
      case "top":
        return this.gotoTop();
      case "bottom":
        return this.gotoBottom();
      case "other":
        return "idle";
    }
  }

  // ── Transitions ─────────────────────────────────────────────────────

  private resize(width: number, height: number): Outcome {
    this.width = Math.max(1, Math.floor(width));
    this.height = Math.max(1, Math.floor(height));
    this.viewport.setHeight(this.height - CHROME_ROWS);

    if (!this.ready) {
      this.ready = true;
      this.reload();
      this.log.debug(`Ready at ${this.width}x${this.height}`);
    } else {
      this.reload(true);
    }
    return "redraw";
  }

  private goToPage(page: PageId | undefined): Outcome {
    if (page === undefined) return "idle";
    this.page = page;
    this.reload();
    return "redraw";
  }

  private select(index: number): Outcome {
    if (index < 0 || index >= this.posts.length) return "idle";
    this.selectedIndex = index;
    this.reload();
    return "redraw";
  }

  private openPost(): Outcome {
    if (!this.onBlogIndex() || this.posts.length === 0) return "idle";
    this.viewingDetail = true;
    this.reload();
    return "redraw";
  }

  private closePost(): Outcome {
    if (!this.viewingDetail) return "idle";
    this.viewingDetail = false;
    this.clampSelection();
    this.reload();
    return "redraw";
  }

  private scroll(delta: number): Outcome {
    return this.viewport.scrollBy(delta) ? "redraw" : "idle";
  }

  private gotoTop(): Outcome {
    if (this.onBlogIndex()) this.selectedIndex = 0;
    this.reload();
    return "redraw";
  }

  private gotoBottom(): Outcome {
    if (this.onBlogIndex() && this.posts.length > 0) {
      this.selectedIndex = this.posts.length - 1;
      this.reload(true);
    }
    this.viewport.gotoBottom();
    return "redraw";
  }

  private onBlogIndex(): boolean {
    return this.page === "blog" && !this.viewingDetail;
  }

  private clampSelection(): void {
    const last = this.posts.length - 1;
    this.selectedIndex = last < 0 ? 0 : Math.min(Math.max(0, this.selectedIndex), last);
  }

  // ── Content ─────────────────────────────────────────────────────────

  /** Rebuild viewport content for the current state. Scrolls to the top unless `keepOffset`. */
  private reload(keepOffset = false): void {
    this.viewport.setContent(padContent(this.pageSource()));
    if (!keepOffset) this.viewport.gotoTop();
  }

  private pageSource(): string {
    const { content } = this.options;
    const page = this.page;
    switch (page) {
      case "projects":
        return this.markdown(projectsMarkdown(content.listProjects()));
      case "blog": {
        const post = this.posts[this.selectedIndex];
        if (this.viewingDetail && post) {
          return [...postHeaderLines(post, this.styles), "", this.markdown(post.body)].join("\n");
        }
        return blogIndexText(this.posts, this.selectedIndex, this.width, this.styles);
      }
      default:
        return this.markdown(content.pageMarkdown(page));
    }
  }

  private markdown(source: string): string {
    return this.cache.getOrRender(source, this.width, () => this.renderer.render(source, this.width));
  }

  // ── Rendering ───────────────────────────────────────────────────────

  render(): string[] {
    if (!this.ready) return [PLACEHOLDER];

    const clock = this.options.clock && this.now ? this.now : undefined;
    const frame = [
      ...renderNavbar({ title: this.options.title, page: this.page, clock }, this.width, this.styles),
      ...this.viewport.visibleLines(this.width),
      renderFooter(this.page, this.viewingDetail, this.width, this.styles),
    ];
    return frame.slice(0, this.height);
  }
}
