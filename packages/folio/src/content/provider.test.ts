import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger } from "termfolio-core";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { sortPosts } from "./posts.js";
import { FileContentProvider } from "./provider.js";

const fixedNow = () => new Date("2024-06-01T08:00:00.000Z");

function post(header: Record<string, string>, body = "Body"): string {
  const lines = Object.entries(header).map(([k, v]) => `${k}: ${v}`);
  return ["---", ...lines, "---", body].join("\n");
}

function makeContentDir(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), "termfolio-content-"));
  for (const [name, text] of Object.entries(files)) {
    const path = join(dir, name);
    mkdirSync(join(path, ".."), { recursive: true });
    writeFileSync(path, text);
  }
  return dir;
}

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  const log: Logger & { warnings: string[] } = {
    warnings,
    debug: vi.fn(),
    info: vi.fn(),
    warn: (msg) => warnings.push(msg),
    error: vi.fn(),
    child: () => log,
  };
  return log;
}

describe("FileContentProvider posts", () => {
  let log: ReturnType<typeof recordingLogger>;

  beforeEach(() => {
    log = recordingLogger();
  });

  it("lists published posts newest first, keeping file order for equal dates", () => {
    const dir = makeContentDir({
      "blog/a.md": post({ title: "A", date: "2024-01-01", published: "true" }),
      "blog/b.md": post({ title: "B", date: "2024-02-01", published: "true" }),
      "blog/c.md": post({ title: "C", date: "2024-02-01", published: "true" }),
      "blog/d.md": post({ title: "Draft", date: "2024-05-01", published: "false" }),
      "blog/e.md": "---\ntitle: Broken\npublished: true\n",
      "blog/notes.txt": post({ title: "Not markdown", published: "true" }),
    });
    const provider = new FileContentProvider({ contentDir: dir, logger: log, now: fixedNow });

    expect(provider.listPosts().map((p) => p.id)).toEqual(["b", "c", "a"]);
    expect(log.warnings).toEqual([`Skipping ${join(dir, "blog", "e.md")}: front matter is not closed`]);
  });

  it("maps header fields onto the post", () => {
    const dir = makeContentDir({
      "blog/hello.md": post(
        {
          title: '"Hello"',
          summary: "Short",
          date: "2024-03-04",
          tags: "[ts, cli]",
          readTime: "2 min",
          author: "Sam",
          published: "true",
        },
        "# Hello\n\nText"
      ),
    });
    const [hello] = new FileContentProvider({ contentDir: dir, now: fixedNow }).listPosts();

    expect(hello).toEqual({
      id: "hello",
      title: "Hello",
      summary: "Short",
      body: "# Hello\n\nText",
      date: new Date("2024-03-04T00:00:00.000Z"),
      dateLabel: "2024-03-04",
      published: true,
      tags: ["ts", "cli"],
      readTime: "2 min",
      author: "Sam",
    });
  });

  it("dates a post with a malformed date at the current time", () => {
    const dir = makeContentDir({
      "blog/undated.md": post({ title: "Undated", date: "someday", published: "true" }),
    });
    const [undated] = new FileContentProvider({ contentDir: dir, now: fixedNow }).listPosts();

    expect(undated.date).toEqual(fixedNow());
    expect(undated.dateLabel).toBe("2024-06-01");
  });

  it("falls back to the bundled posts when the blog directory is missing", () => {
    const dir = makeContentDir({});
    const posts = new FileContentProvider({ contentDir: dir, logger: log }).listPosts();

    expect(posts.map((p) => p.id)).toEqual(["terminal-interfaces", "serving-over-ssh", "markdown-everywhere"]);
    expect(posts.every((p) => p.published)).toBe(true);
    expect(log.warnings).toHaveLength(1);
  });

  it("falls back to the bundled posts when nothing is published", () => {
    const dir = makeContentDir({
      "blog/draft.md": post({ title: "Draft", date: "2024-01-01", published: "false" }),
      "blog/plain.md": "No header at all",
    });
    const provider = new FileContentProvider({ contentDir: dir, logger: log });

    expect(provider.listPosts()).toHaveLength(3);
    expect(log.warnings).toEqual([`No published posts in ${join(dir, "blog")}; using fallback posts`]);
  });

  it("loads posts once", () => {
    const dir = makeContentDir({
      "blog/a.md": post({ title: "A", date: "2024-01-01", published: "true" }),
    });
    const provider = new FileContentProvider({ contentDir: dir });
    const first = provider.listPosts();

    writeFileSync(join(dir, "blog", "b.md"), post({ title: "B", date: "2024-02-01", published: "true" }));
    expect(provider.listPosts()).toBe(first);
  });
});

describe("sortPosts", () => {
  it("does not mutate its input", () => {
    const dir = makeContentDir({
      "blog/a.md": post({ title: "A", date: "2024-01-01", published: "true" }),
      "blog/b.md": post({ title: "B", date: "2024-02-01", published: "true" }),
    });
    const posts = new FileContentProvider({ contentDir: dir }).listPosts();
    const reversed = [...posts].reverse();

    expect(sortPosts(reversed).map((p) => p.id)).toEqual(["b", "a"]);
    expect(reversed.map((p) => p.id)).toEqual(["a", "b"]);
  });
});

describe("FileContentProvider projects", () => {
  const project = {
    name: "Widget",
    description: "Makes widgets",
    technologies: ["TypeScript"],
    features: ["Fast"],
    status: "Active",
    url: "https://example.com/widget",
  };

  it("reads projects.json in file order", () => {
    const dir = makeContentDir({
      "projects.json": JSON.stringify([project, { ...project, name: "Gadget", url: undefined }]),
    });
    const projects = new FileContentProvider({ contentDir: dir }).listProjects();

    expect(projects.map((p) => p.name)).toEqual(["Widget", "Gadget"]);
    expect(projects[0]).toEqual(project);
    expect(projects[1].url).toBeUndefined();
  });

  it.each([
    ["missing", {}],
    ["malformed", { "projects.json": "[{" }],
    ["invalid", { "projects.json": JSON.stringify([{ name: "No fields" }]) }],
    ["empty", { "projects.json": "[]" }],
  ])("falls back to the bundled projects when the file is %s", (_label, files) => {
    const dir = makeContentDir(files);
    const projects = new FileContentProvider({ contentDir: dir }).listProjects();

    expect(projects.map((p) => p.name)).toEqual([
      "Terminal Portfolio",
      "Static Site Toolkit",
      "Open Source Contributions",
    ]);
  });
});

describe("FileContentProvider pages", () => {
  it("prefers a page from the content directory", () => {
    const dir = makeContentDir({ "pages/about.md": "# About me\n" });
    const provider = new FileContentProvider({ contentDir: dir });

    expect(provider.pageMarkdown("about")).toBe("# About me\n");
  });

  it("uses the bundled page otherwise", () => {
    const dir = makeContentDir({});
    const provider = new FileContentProvider({ contentDir: dir });

    expect(provider.pageMarkdown("home").startsWith("# 🚀 Welcome\n")).toBe(true);
    expect(provider.pageMarkdown("contact").startsWith("# 📬 Get In Touch\n")).toBe(true);
  });
});
