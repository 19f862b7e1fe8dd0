import { readFile } from "node:fs/promises";
import { log } from "../logger.js";
import type { Feed, RawTick } from "./types.js";

function splitCsvLine(line: string): string[] {
  return line.split(",").map((cell) => cell.trim());
}

/**
 * Replays a CSV written by the recorder. Finite; every call to `ticks()` reads the
 * file again from the first row.
 */
export class ReplayFeed implements Feed {
  readonly name = "replay";

  constructor(private readonly path: string) {}

  async *ticks(signal?: AbortSignal): AsyncIterable<RawTick> {
    const text = await readFile(this.path, "utf-8");
    const lines = text.split(/\r?\n/);
    const header = splitCsvLine(lines[0] ?? "");
    if (header.length === 0 || header[0] === "") {
      log.warn("Replay file is empty", { path: this.path });
      return;
    }

    let emitted = 0;
    for (let i = 1; i < lines.length; i++) {
      if (signal?.aborted) break;
      const line = lines[i];
      if (line.trim() === "" || line.startsWith("#")) continue;
      const cells = splitCsvLine(line);
      const row: Record<string, string> = {};
      header.forEach((col, idx) => {
        row[col] = cells[idx] ?? "";
      });
      emitted++;
      yield { kind: "replay-row", line: i + 1, row };
    }
    log.info("Replay finished", { path: this.path, rows: emitted });
  }
}
