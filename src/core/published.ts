export interface PublishedDate {
  /** Calendar year, when one can be read at all. */
  year?: number;
  /** Epoch milliseconds, only when the value names at least a full day. */
  time?: number;
}

/**
 * Reads a publish date the way the reindexer buckets it. `2021` and `2021-03`
 * give a year but no instant; anything unparseable gives neither.
 */
export function readPublished(value: string | undefined): PublishedDate {
  const text = value?.trim();
  if (!text) return {};

  const yearOnly = /^(\d{4})(?:-(\d{2}))?$/.exec(text);
  if (yearOnly) return { year: Number(yearOnly[1]) };

  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(text);
  const iso = compact ? `${compact[1]}-${compact[2]}-${compact[3]}` : text;
  const time = Date.parse(/^\d{4}-\d{2}-\d{2}$/.test(iso) ? `${iso}T00:00:00Z` : iso);
  if (Number.isNaN(time)) return {};
  return { year: new Date(time).getUTCFullYear(), time };
}

/** Season 0 is where media-library software files specials; used for undated episodes. */
export const UNDATED_SEASON = 0;

export function seasonFolder(season: number): string {
  return season === UNDATED_SEASON ? "Specials" : `Season ${season}`;
}

export function seasonFor(value: string | undefined): number {
  return readPublished(value).year ?? UNDATED_SEASON;
}
