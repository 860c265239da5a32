/**
 * Front-matter parsing for Markdown content files.
 *
 * Format:
 *
 *   ---
 *   title: "Hello"
 *   date: 2024-01-15
 *   tags: [terminal, "tui"]
 *   published: true
 *   ---
 *   body...
 *
 * Parsing is lenient: unknown keys are ignored, lines without a colon are
 * skipped and missing fields stay empty. A document without an opening
 * delimiter has an empty header. An opening delimiter with no closing one is
 * malformed and yields null.
 */

export interface FrontMatter {
  title: string;
  summary: string;
  /** Raw date string as written; see parseIsoDate. */
  date: string;
  tags: string[];
  readTime: string;
  author: string;
  published: boolean;
}

export interface ParsedDocument {
  header: FrontMatter;
  body: string;
}

const DELIMITER = "---";

export function emptyFrontMatter(): FrontMatter {
  return { title: "", summary: "", date: "", tags: [], readTime: "", author: "", published: false };
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

function parseTags(value: string): string[] {
  const inner = value.replace(/^\[/, "").replace(/\]$/, "").trim();
  if (!inner) return [];
  return inner
    .split(",")
    .map((tag) => unquote(tag.trim()))
    .filter((tag) => tag.length > 0);
}

function applyField(header: FrontMatter, key: string, value: string): void {
  switch (key) {
    case "title":
      header.title = value;
      break;
    case "summary":
      header.summary = value;
      break;
    case "date":
      header.date = value;
      break;
    case "readTime":
      header.readTime = value;
      break;
    case "author":
      header.author = value;
      break;
    case "published":
      header.published = value === "true";
      break;
    case "tags":
      header.tags = parseTags(value);
      break;
  }
}

export function parseFrontMatter(text: string): ParsedDocument | null {
  const normalized = text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n");
  if (!normalized.startsWith(`${DELIMITER}\n`)) {
    return { header: emptyFrontMatter(), body: normalized };
  }

  const lines = normalized.split("\n");
  const close = lines.findIndex((line, i) => i > 0 && line.trim() === DELIMITER);
  if (close === -1) return null;

  const header = emptyFrontMatter();
  for (const raw of lines.slice(1, close)) {
    const line = raw.trim();
    const colon = line.indexOf(":");
    if (colon === -1) continue;

    const key = line.slice(0, colon).trim();
    const value = unquote(line.slice(colon + 1).trim());
    applyField(header, key, value);
  }

  return { header, body: lines.slice(close + 1).join("\n") };
}

/** Parse a strict YYYY-MM-DD calendar date as UTC midnight, or null. */
export function parseIsoDate(value: string): Date | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!m) return null;

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/** Format a date as YYYY-MM-DD in UTC. */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
