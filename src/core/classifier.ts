import { ClassificationError } from "./errors.js";
import type { PlatformRegistry } from "./platform-registry.js";
import type { ClassifiedReference, Platform } from "./types.js";

const PREFIXED = /^([a-z][a-z_]*):(.+)$/i;
// host.tld/… typed without a scheme; GitHub owners cannot contain dots, so owner/repo never matches
const SCHEMELESS_HOST = /^[a-z0-9-]+(\.[a-z0-9-]+)+(:\d+)?(\/|$)/i;

/** Parses http(s) URLs only; anything else (mailto:, bare words, owner/repo) yields null. */
export function parseHttpUrl(input: string): URL | null {
  if (/\s/.test(input)) return null;
  const candidate = SCHEMELESS_HOST.test(input) ? `https://${input}` : input;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  if (!url.hostname.includes(".") && url.hostname !== "localhost") return null;
  return url;
}

/** Absolute URLs with a host under any other scheme (ftp:, gemini:, …). */
export function parseOtherSchemeUrl(input: string): URL | null {
  if (/\s/.test(input) || !/^[a-z][a-z\d+.-]*:\/\//i.test(input)) return null;
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return null;
  }
  if (url.protocol === "http:" || url.protocol === "https:" || !url.hostname) return null;
  return url;
}

function classified(platform: Platform, remoteId: string): ClassifiedReference {
  return { platform, canonicalId: `${platform}:${remoteId}` };
}

/**
 * Decides which platform a raw reference belongs to and derives its canonical id.
 *
 * Precedence:
 *  1. `<platform or alias>:<id>` prefixes (`youtube:`, `yt:`, `hn:`, `web:`, …)
 *  2. http(s) URLs, tried against each platform's URL matcher in registry order;
 *     the `web` entry is registered last and accepts any remaining URL
 *  3. URLs under other schemes, which only `web` takes
 *  4. bare id shapes (11-character video id, owner/repo), again in registry order
 */
export function classify(registry: PlatformRegistry, rawReference: string): ClassifiedReference {
  const input = rawReference.trim();
  if (!input) throw new ClassificationError("InvalidReference", rawReference);

  const prefixed = PREFIXED.exec(input);
  if (prefixed) {
    const platform = registry.platformForPrefix(prefixed[1]);
    if (platform) {
      const remoteId = registry.get(platform).normalizeId(prefixed[2].trim());
      if (remoteId === null) throw new ClassificationError("InvalidReference", rawReference);
      return classified(platform, remoteId);
    }
  }

  const url = parseHttpUrl(input);
  if (url) {
    for (const entry of registry.all()) {
      const remoteId = entry.matchUrl?.(url);
      if (remoteId) return classified(entry.platform, remoteId);
    }
    throw new ClassificationError("InvalidReference", rawReference);
  }

  const other = parseOtherSchemeUrl(input);
  if (other && registry.has("web")) {
    const remoteId = registry.get("web").normalizeId(other.href);
    if (remoteId) return classified("web", remoteId);
  }

  for (const entry of registry.all()) {
    const remoteId = entry.matchBare?.(input);
    if (remoteId) return classified(entry.platform, remoteId);
  }

  throw new ClassificationError("InvalidReference", rawReference);
}

/** `classify` for callers that treat an unrecognised reference as "no platform". */
export function tryClassify(registry: PlatformRegistry, rawReference: string): ClassifiedReference | null {
  try {
    return classify(registry, rawReference);
  } catch (err) {
    if (err instanceof ClassificationError) return null;
    throw err;
  }
}

/** Splits a canonical id back into platform and remote id. */
export function splitCanonicalId(canonicalId: string): { platform: string; remoteId: string } {
  const idx = canonicalId.indexOf(":");
  if (idx <= 0) return { platform: "", remoteId: canonicalId };
  return { platform: canonicalId.slice(0, idx), remoteId: canonicalId.slice(idx + 1) };
}
