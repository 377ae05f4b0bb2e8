import { ElementQuery, Point, Rect, UIElement } from "../types/desktop.types";

export function normalizeRole(role: string): string {
  return role.replace(/^AX/, "").toLowerCase();
}

export function hasSelector(query: ElementQuery): boolean {
  return Boolean(query.role || query.name || query.nameContains || query.title);
}

export function matchesElementQuery(
  element: UIElement,
  query: ElementQuery,
): boolean {
  if (query.role && normalizeRole(element.role) !== normalizeRole(query.role)) {
    return false;
  }
  if (query.name && element.name !== query.name) {
    return false;
  }
  if (
    query.nameContains &&
    !element.name.toLowerCase().includes(query.nameContains.toLowerCase())
  ) {
    return false;
  }
  if (query.title && element.title !== query.title) {
    return false;
  }
  return true;
}

export function rectCenter(rect: Rect): Point {
  return {
    x: rect.x + Math.floor(rect.width / 2),
    y: rect.y + Math.floor(rect.height / 2),
  };
}

export function describeElementQuery(query: ElementQuery): string {
  const parts: string[] = [];
  if (query.role) parts.push(`role=${query.role}`);
  if (query.name) parts.push(`name=${query.name}`);
  if (query.nameContains) parts.push(`name_contains=${query.nameContains}`);
  if (query.title) parts.push(`title=${query.title}`);
  return parts.join(", ");
}
