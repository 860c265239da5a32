/**
 * Post construction and ordering, shared by the provider and the bundled
 * fallback dataset.
 */
import type { Post } from "../types.js";
import { type ParsedDocument, formatIsoDate, parseIsoDate } from "./frontmatter.js";

/** Build a post from a parsed document. A bad or missing date becomes `now`. */
export function postFromDocument(id: string, doc: ParsedDocument, now: Date): Post {
  const { header } = doc;
  const date = parseIsoDate(header.date) ?? now;
  return {
    id,
    title: header.title,
    summary: header.summary,
    body: doc.body,
    date,
    dateLabel: formatIsoDate(date),
    published: header.published,
    tags: header.tags,
    readTime: header.readTime,
    author: header.author,
  };
}

/** Newest first. Posts sharing a date keep their relative order. */
export function sortPosts(posts: readonly Post[]): Post[] {
  return [...posts].sort((a, b) => b.date.getTime() - a.date.getTime());
}
