import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config.js";

const WALLABAG = {
  WALLABAG_HOST: "https://wallabag.example.org",
  WALLABAG_CLIENT_ID: "test-client",
  WALLABAG_CLIENT_SECRET: "test-secret",
  WALLABAG_USERNAME: "reader",
  WALLABAG_PASSWORD: "test-password",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      notesDir: join(homedir(), "notes", "capture"),
      mediaDir: join(homedir(), "Media"),
      dataDir: join(homedir(), ".mdcapture"),
      concurrency: 4,
      fetchTimeoutMs: 15_000,
      ytDlpBinary: "yt-dlp",
      playerBinary: "mpv",
      databaseUrl: undefined,
      githubToken: undefined,
      wallabag: undefined,
      freshrss: undefined,
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = loadConfig({
      MDCAPTURE_NOTES_DIR: "/srv/notes",
      MDCAPTURE_CONCURRENCY: "8",
      GITHUB_TOKEN: "   ",
    });
    expect(config.notesDir).toBe("/srv/notes");
    expect(config.concurrency).toBe(8);
    expect(config.githubToken).toBeUndefined();
  });

  it("configures an inbox source only when every credential is set", () => {
    expect(loadConfig({ ...WALLABAG, WALLABAG_PASSWORD: "" }).wallabag).toBeUndefined();
    expect(loadConfig(WALLABAG).wallabag).toEqual({
      host: "https://wallabag.example.org",
      clientId: "test-client",
      clientSecret: "test-secret",
      username: "reader",
      password: "test-password",
      onCapture: "keep",
    });

    const freshrss = loadConfig({
      FRESHRSS_URL: "https://rss.example.org/api/greader.php",
      FRESHRSS_USERNAME: "reader",
      FRESHRSS_PASSWORD: "test-password",
    }).freshrss;
    expect(freshrss?.onCapture).toBe("discard");
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ MDCAPTURE_CONCURRENCY: "0", WALLABAG_HOST: "not a url", FRESHRSS_ON_CAPTURE: "archive" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.issues.map((i) => i.split(":")[0]) : []).toEqual([
      "MDCAPTURE_CONCURRENCY",
      "WALLABAG_HOST",
      "FRESHRSS_ON_CAPTURE",
    ]);
  });
});
