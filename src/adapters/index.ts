import { PlatformRegistry } from "../core/platform-registry.js";
import type { MediaCacher } from "../core/types.js";
import type { YtDlpRunner } from "../media/yt-dlp.js";
import { freshRssPlatform, type FreshRssClient } from "../inbox/freshrss.js";
import { wallabagPlatform, type WallabagClient } from "../inbox/wallabag.js";
import { githubPlatform } from "./github.js";
import { googleSearchPlatform } from "./google-search.js";
import { hackerNewsPlatform } from "./hackernews.js";
import { podcastPlatform } from "./podcast.js";
import { redditPlatform } from "./reddit.js";
import { steamPlatform } from "./steam.js";
import { webPlatform } from "./web.js";
import { youtubePlatform } from "./youtube.js";

export interface RegistryDeps {
  ytDlp: YtDlpRunner;
  timeoutMs?: number;
  githubToken?: string;
  youtubeCacher?: MediaCacher;
  podcastCacher?: MediaCacher;
  wallabag?: WallabagClient | null;
  freshrss?: FreshRssClient | null;
}

/**
 * Registration order is classification precedence. Google search URLs and
 * the specialised hosts come first; podcast enclosures are recognised by
 * file extension, so they sit just before the catch-all web entry.
 */
export function createPlatformRegistry(deps: RegistryDeps): PlatformRegistry {
  const timeoutMs = deps.timeoutMs;
  const registry = new PlatformRegistry();
  registry.register(googleSearchPlatform(), ["google"]);
  registry.register(youtubePlatform(deps.ytDlp, deps.youtubeCacher), ["yt"]);
  registry.register(githubPlatform({ token: deps.githubToken, timeoutMs }), ["gh"]);
  registry.register(redditPlatform({ timeoutMs }));
  registry.register(hackerNewsPlatform({ timeoutMs }), ["hn"]);
  registry.register(steamPlatform({ timeoutMs }));
  registry.register(wallabagPlatform(deps.wallabag ?? null));
  registry.register(podcastPlatform({ timeoutMs }, deps.podcastCacher));
  registry.register(freshRssPlatform(deps.freshrss ?? null));
  registry.register(webPlatform({ timeoutMs }));
  return registry;
}
