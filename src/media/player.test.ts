import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { setLogSink } from "../logger.js";
import { SpawnMediaPlayer, playerArgs } from "./player.js";

let restoreSink: ((line: string) => void) | undefined;

beforeEach(() => {
  restoreSink = setLogSink(() => {});
});

afterEach(() => {
  if (restoreSink) setLogSink(restoreSink);
});

describe("playerArgs", () => {
  it("opens videos in a window", () => {
    expect(
      playerArgs({ canonicalId: "youtube:dQw4w9WgXcQ", platform: "youtube", location: "/m/a.mp4", cached: true }),
    ).toEqual(["/m/a.mp4", "--force-window=yes"]);
  });

  it("plays podcasts faster and remembers the position", () => {
    const location = "https://cdn.example.com/ep1.mp3";
    expect(playerArgs({ canonicalId: `podcast:${location}`, platform: "podcast", location, cached: false })).toEqual([
      location,
      "--audio-display=no",
      "--save-position-on-quit",
      "--speed=1.5",
    ]);
  });
});

describe("SpawnMediaPlayer", () => {
  it("reports a player binary that cannot be started", async () => {
    const player = new SpawnMediaPlayer("mdcapture-missing-player");
    await expect(
      player.open({ canonicalId: "youtube:dQw4w9WgXcQ", platform: "youtube", location: "/m/a.mp4", cached: true }),
    ).rejects.toThrow("Failed to start mdcapture-missing-player: spawn mdcapture-missing-player ENOENT");
  });
});
