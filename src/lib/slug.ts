import { createHash } from "crypto";

export const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

const MAX_SLUG_LENGTH = 80;

/**
 * Lowercase ASCII slug. Latin diacritics are folded, every other character
 * outside [a-z0-9] becomes a separator. Returns "" when nothing survives.
 */
export function toSlug(value: string): string {
  const slug = value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

  if (slug.length <= MAX_SLUG_LENGTH) {
    return slug;
  }
  const head = slug.slice(0, MAX_SLUG_LENGTH);
  // Cut fell on a separator: the last word is already complete.
  if (slug[MAX_SLUG_LENGTH] === "-") {
    return head.replace(/-+$/, "");
  }
  return head.replace(/-+[^-]*$/, "") || head;
}

/** First candidate that slugifies to something, else `post-<hash of seed>`. */
export function resolveSlug(candidates: Array<string | undefined>, seed: string): string {
  for (const candidate of candidates) {
    if (!candidate) continue;
    const slug = toSlug(candidate);
    if (slug) return slug;
  }
  const digest = createHash("sha1").update(seed).digest("hex").slice(0, 8);
  return `post-${digest}`;
}
