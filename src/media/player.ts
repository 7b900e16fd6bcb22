import { spawn } from "node:child_process";
import type { MediaPlayer, Platform, PlayTarget } from "../core/types.js";
import { log } from "../logger.js";

const PLATFORM_ARGS: Partial<Record<Platform, string[]>> = {
  youtube: ["--force-window=yes"],
  podcast: ["--audio-display=no", "--save-position-on-quit", "--speed=1.5"],
};

export function playerArgs(target: PlayTarget): string[] {
  return [target.location, ...(PLATFORM_ARGS[target.platform] ?? [])];
}

/** Starts mpv (or whatever `binary` names) detached, so playback outlives the command. */
export class SpawnMediaPlayer implements MediaPlayer {
  constructor(private binary = "mpv") {}

  open(target: PlayTarget): Promise<void> {
    return new Promise((resolvePromise, reject) => {
      const child = spawn(this.binary, playerArgs(target), { detached: true, stdio: "ignore" });

      child.once("spawn", () => {
        log.info("play.started", { canonicalId: target.canonicalId, pid: child.pid, cached: target.cached });
        child.unref();
        resolvePromise();
      });

      child.once("error", (error) => {
        reject(new Error(`Failed to start ${this.binary}: ${error.message}`, { cause: error }));
      });
    });
  }
}
