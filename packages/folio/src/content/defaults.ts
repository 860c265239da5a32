/**
 * Bundled default dataset: fallback posts, fallback projects and the
 * default static pages. Used by the content provider whenever the content
 * directory has nothing usable.
 */
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Post, Project, StaticPageId } from "../types.js";
import { formatIsoDate, parseIsoDate } from "./frontmatter.js";
import { sortPosts } from "./posts.js";
import { type BundledPost, BundledPostListSchema, ProjectListSchema } from "./schema.js";

const DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

/** Read and validate a bundled JSON file. A failure here means a broken install. */
function loadBundledJson<T extends TSchema>(file: string, schema: T): Static<T> {
  const raw: unknown = JSON.parse(readFileSync(join(DATA_DIR, file), "utf-8"));
  if (!Value.Check(schema, raw)) {
    const first = Value.Errors(schema, raw).First();
    throw new Error(`Bundled ${file} is invalid: ${first ? `${first.path} ${first.message}` : "unknown"}`);
  }
  return raw;
}

function toPost(entry: BundledPost): Post {
  const date = parseIsoDate(entry.date) ?? new Date(0);
  return {
    id: entry.id,
    title: entry.title,
    summary: entry.summary,
    body: entry.body,
    date,
    dateLabel: formatIsoDate(date),
    published: true,
    tags: [],
    readTime: "",
    author: "",
  };
}

/** Bundled entries as published posts, newest first whatever the file order. */
export function bundledPosts(entries: readonly BundledPost[]): Post[] {
  return sortPosts(entries.map(toPost));
}

let posts: readonly Post[] | undefined;
let projects: readonly Project[] | undefined;
const pages = new Map<StaticPageId, string>();

export function fallbackPosts(): readonly Post[] {
  posts ??= bundledPosts(loadBundledJson("fallback-posts.json", BundledPostListSchema));
  return posts;
}

export function fallbackProjects(): readonly Project[] {
  projects ??= loadBundledJson("fallback-projects.json", ProjectListSchema);
  return projects;
}

export function defaultPageMarkdown(page: StaticPageId): string {
  let text = pages.get(page);
  if (text === undefined) {
    text = readFileSync(join(DATA_DIR, "pages", `${page}.md`), "utf-8");
    pages.set(page, text);
  }
  return text;
}
