import type { Platform, PlatformDescriptor, PlatformEntry } from "./types.js";

/**
 * Platform → {matchers, fetcher, cacher?}. Registration order is matching
 * precedence: the classifier tries URL and bare-id matchers in the order the
 * entries were registered.
 */
export class PlatformRegistry {
  private entries = new Map<Platform, PlatformEntry>();
  private prefixes = new Map<string, Platform>();

  register(entry: PlatformEntry, aliases: string[] = []): void {
    if (this.entries.has(entry.platform)) {
      throw new Error(`Platform already registered: ${entry.platform}`);
    }
    this.entries.set(entry.platform, entry);
    for (const prefix of [entry.platform, ...aliases]) {
      this.prefixes.set(prefix.toLowerCase(), entry.platform);
    }
  }

  get(platform: Platform): PlatformEntry {
    const entry = this.entries.get(platform);
    if (!entry) throw new Error(`Unknown platform: ${platform}`);
    return entry;
  }

  has(platform: Platform): boolean {
    return this.entries.has(platform);
  }

  /** Resolves `yt`, `hn`, `youtube`, … to the platform they stand for. */
  platformForPrefix(prefix: string): Platform | undefined {
    return this.prefixes.get(prefix.toLowerCase());
  }

  isCacheable(platform: Platform): boolean {
    return this.entries.get(platform)?.cacher !== undefined;
  }

  all(): PlatformEntry[] {
    return [...this.entries.values()];
  }

  describeAll(): PlatformDescriptor[] {
    return this.all().map((e) => ({
      platform: e.platform,
      displayName: e.displayName,
      description: e.description,
      cacheable: e.cacher !== undefined,
    }));
  }
}
