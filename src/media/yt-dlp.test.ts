import { describe, expect, it } from "vitest";
import { YtDlpExitError, classifyYtDlpError, toYtDlpCacheError, toYtDlpFetchError } from "./yt-dlp.js";

describe("classifyYtDlpError", () => {
  it.each([
    ["ERROR: Sign in to confirm your age", "permission_error"],
    ["ERROR: This video is not available in your country", "geo_restriction"],
    ["ERROR: HTTP Error 503: Service Unavailable", "network_error"],
    ["ERROR: Requested format is not available", "format_error"],
    ["ERROR: [youtube] x: Video unavailable", "video_unavailable"],
    ["ERROR: something else entirely", "unknown_error"],
  ])("%s → %s", (stderr, expected) => {
    expect(classifyYtDlpError(stderr)).toBe(expected);
  });
});

describe("YtDlpExitError", () => {
  it("quotes the last stderr line", () => {
    const err = new YtDlpExitError(2, "line one\nERROR: Video unavailable\n");
    expect(err.message).toBe("yt-dlp exited with code 2: ERROR: Video unavailable");
    expect(err.errorType).toBe("video_unavailable");
  });

  it("maps onto fetch and cache error kinds", () => {
    const format = new YtDlpExitError(1, "ERROR: Requested format is not available");
    expect(toYtDlpFetchError(format).kind).toBe("NotFound");
    expect(toYtDlpCacheError(format).kind).toBe("Unsupported");

    const geo = new YtDlpExitError(1, "ERROR: geo-restricted");
    expect(toYtDlpFetchError(geo).kind).toBe("AuthFailure");
    expect(toYtDlpCacheError(geo).kind).toBe("DownloadFailed");
  });
});
