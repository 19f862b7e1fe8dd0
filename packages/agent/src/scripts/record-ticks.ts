import chalk from "chalk";
import { loadConfig } from "../config.js";
import { MalformedFeedData } from "../errors.js";
import { ClobFeed } from "../feed/clob-feed.js";
import { normalize } from "../feed/normalizer.js";
import { CsvRecorder } from "../feed/recorder.js";

// ---------------------------------------------------------------------------
// Config & CLI args
// ---------------------------------------------------------------------------

function parseFlag(name: string): string | undefined {
  const idx = process.argv.indexOf(name);
  if (idx === -1 || idx + 1 >= process.argv.length) return undefined;
  return process.argv[idx + 1];
}

const OUT_PATH = parseFlag("--out") ?? "ticks.csv";
const MAX_TICKS = Number(parseFlag("--ticks") ?? Infinity);

const config = loadConfig({ ...process.env, FEED: "live", EXECUTION_MODE: "dry-run" });
const feed = new ClobFeed({ markets: config.markets, pollIntervalMs: config.pollIntervalMs, clobBase: config.clobApiBase });
const recorder = new CsvRecorder(OUT_PATH);
const controller = new AbortController();

process.on("SIGINT", () => controller.abort());
process.on("SIGTERM", () => controller.abort());

console.log(`Recording ${chalk.cyan(String(Object.keys(config.markets).length))} markets to ${chalk.cyan(OUT_PATH)}` + chalk.dim(" (Ctrl+C to stop)"));

let skipped = 0;
for await (const raw of feed.ticks(controller.signal)) {
  try {
    recorder.write(normalize(raw));
  } catch (err) {
    if (!(err instanceof MalformedFeedData)) throw err;
    skipped++;
  }
  if (recorder.count >= MAX_TICKS) controller.abort();
}

console.log(`Recorded ${chalk.green(String(recorder.count))} ticks` + chalk.dim(` (${skipped} malformed skipped)`));
