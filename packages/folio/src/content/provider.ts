/**
 * Content provider — posts, projects and static pages for every session.
 *
 * Layout of a content directory:
 *
 *   <contentDir>/blog/*.md        posts with a front-matter header
 *   <contentDir>/projects.json    array of projects
 *   <contentDir>/pages/<id>.md    home, about, contact
 *
 * Every accessor is total: missing or broken content falls back to the
 * bundled dataset. Results are loaded once and then shared read-only.
 */

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { basename, join } from "node:path";
import { Value } from "@sinclair/typebox/value";
import { type Logger, errorMessage, silentLogger } from "termfolio-core";
import type { Post, Project, StaticPageId } from "../types.js";
import { defaultPageMarkdown, fallbackPosts, fallbackProjects } from "./defaults.js";
import { parseFrontMatter } from "./frontmatter.js";
import { postFromDocument, sortPosts } from "./posts.js";
import { ProjectListSchema } from "./schema.js";

export interface ContentProvider {
  /** Published posts, newest first. Never empty. */
  listPosts(): readonly Post[];
  /** Projects in file order. Never empty. */
  listProjects(): readonly Project[];
  pageMarkdown(page: StaticPageId): string;
}

export interface FileContentProviderOptions {
  contentDir: string;
  logger?: Logger;
  /** Date used for posts whose date is missing or malformed. */
  now?: () => Date;
}

export class FileContentProvider implements ContentProvider {
  private readonly contentDir: string;
  private readonly log: Logger;
  private readonly now: () => Date;

  private posts: readonly Post[] | null = null;
  private projects: readonly Project[] | null = null;
  private readonly pages = new Map<StaticPageId, string>();

  constructor(options: FileContentProviderOptions) {
    this.contentDir = options.contentDir;
    this.log = (options.logger ?? silentLogger).child("content");
    this.now = options.now ?? (() => new Date());
  }

  listPosts(): readonly Post[] {
    this.posts ??= this.loadPosts();
    return this.posts;
  }

  listProjects(): readonly Project[] {
    this.projects ??= this.loadProjects();
    return this.projects;
  }

  pageMarkdown(page: StaticPageId): string {
    let text = this.pages.get(page);
    if (text === undefined) {
      text = this.loadPage(page);
      this.pages.set(page, text);
    }
    return text;
  }

  // ── Posts ───────────────────────────────────────────────────────────

  private loadPosts(): readonly Post[] {
    const dir = join(this.contentDir, "blog");
    let files: string[];
    try {
      files = readdirSync(dir, { withFileTypes: true })
        .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
        .map((entry) => entry.name)
        .sort();
    } catch (err) {
      this.log.warn(`Cannot read ${dir}: ${errorMessage(err)}; using fallback posts`);
      return fallbackPosts();
    }

    const published: Post[] = [];
    for (const file of files) {
      const post = this.readPost(join(dir, file));
      if (post?.published) published.push(post);
    }

    if (published.length === 0) {
      this.log.warn(`No published posts in ${dir}; using fallback posts`);
      return fallbackPosts();
    }
    this.log.debug(`Loaded ${published.length} of ${files.length} posts from ${dir}`);
    return sortPosts(published);
  }

  private readPost(path: string): Post | null {
    let text: string;
    try {
      text = readFileSync(path, "utf-8");
    } catch (err) {
      this.log.warn(`Skipping ${path}: ${errorMessage(err)}`);
      return null;
    }

    const doc = parseFrontMatter(text);
    if (!doc) {
      this.log.warn(`Skipping ${path}: front matter is not closed`);
      return null;
    }
    return postFromDocument(basename(path, ".md"), doc, this.now());
  }

  // ── Projects ────────────────────────────────────────────────────────

  private loadProjects(): readonly Project[] {
    const path = join(this.contentDir, "projects.json");
    if (!existsSync(path)) {
      this.log.debug(`No ${path}; using fallback projects`);
      return fallbackProjects();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      this.log.warn(`Cannot load ${path}: ${errorMessage(err)}; using fallback projects`);
      return fallbackProjects();
    }

    if (!Value.Check(ProjectListSchema, raw)) {
      const first = Value.Errors(ProjectListSchema, raw).First();
      const where = first ? `${first.path || "/"}: ${first.message}` : "invalid";
      this.log.warn(`Invalid ${path} (${where}); using fallback projects`);
      return fallbackProjects();
    }
    if (raw.length === 0) {
      this.log.warn(`${path} lists no projects; using fallback projects`);
      return fallbackProjects();
    }
    return raw;
  }

  // ── Pages ───────────────────────────────────────────────────────────

  private loadPage(page: StaticPageId): string {
    const path = join(this.contentDir, "pages", `${page}.md`);
    if (existsSync(path)) {
      try {
        return readFileSync(path, "utf-8");
      } catch (err) {
        this.log.warn(`Cannot read ${path}: ${errorMessage(err)}; using default page`);
      }
    }
    return defaultPageMarkdown(page);
  }
}
