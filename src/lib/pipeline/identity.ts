import { createHash } from "crypto";

/**
 * Stable dedup key for an item: SHA-256 over its title and link.
 * The title is length-prefixed so no (title, link) pair can collide with another
 * by shifting characters across the boundary.
 * Returns null when both fields are empty; such items are never delivered.
 */
export function identify(title: string, link: string): string | null {
  if (!title.trim() && !link.trim()) {
    return null;
  }

  return createHash("sha256")
    .update(`${title.length}:${title}\n${link}`, "utf8")
    .digest("hex");
}
