#!/usr/bin/env node
import "dotenv/config";
import { createApp } from "./app.js";
import { runCli } from "./cli/run.js";
import { loadConfig } from "./config.js";
import { SpawnMediaPlayer } from "./media/player.js";

async function main() {
  const config = loadConfig();
  const app = createApp(config);

  // first Ctrl-C stops new notes from starting; a second one kills downloads and exits
  const stop = new AbortController();
  const abort = new AbortController();
  process.on("SIGINT", () => {
    if (stop.signal.aborted) {
      abort.abort();
      process.exit(130);
    }
    console.error("Interrupted; finishing notes already in progress…");
    stop.abort();
  });

  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      service: app.service,
      out: (line) => console.log(line),
      err: (line) => console.error(line),
      signal: stop.signal,
      abort: abort.signal,
      concurrency: config.concurrency,
      player: new SpawnMediaPlayer(config.playerBinary),
    });
  } finally {
    await app.close();
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
