import type { PageId } from "./types.js";

export interface PageDef {
  id: PageId;
  label: string;
}

/** Navigation order, left to right. */
export const PAGES: readonly PageDef[] = [
  { id: "home", label: "Home" },
  { id: "projects", label: "Projects" },
  { id: "blog", label: "Blog" },
  { id: "about", label: "About" },
  { id: "contact", label: "Contact" },
];

export const FIRST_PAGE: PageId = "home";

export function pageIndex(id: PageId): number {
  return PAGES.findIndex((p) => p.id === id);
}

/** The page left of `id`, or undefined at the first page. */
export function previousPage(id: PageId): PageId | undefined {
  const i = pageIndex(id);
  return i > 0 ? PAGES[i - 1].id : undefined;
}

/** The page right of `id`, or undefined at the last page. */
export function nextPage(id: PageId): PageId | undefined {
  const i = pageIndex(id);
  return i >= 0 && i < PAGES.length - 1 ? PAGES[i + 1].id : undefined;
}
