import { createHash } from "node:crypto";

export function slugify(text: string, maxLen = 48): string {
  return text
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, maxLen)
    .replace(/-$/, "");
}

/** Folder-safe form of a show name; keeps case and spaces, replaces path-hostile characters. */
export function safeDirName(name: string): string {
  const cleaned = name.replace(/[/\\?%*:|"<>\x00-\x1f]/g, "_").replace(/^\.+/, "_").trim();
  return cleaned.slice(0, 120) || "_";
}

export function shortHash(text: string, length = 8): string {
  return createHash("sha1").update(text).digest("hex").slice(0, length);
}
