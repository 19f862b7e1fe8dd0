import chalk from "chalk";
import { loadConfig } from "../config.js";
import { createRuntime } from "../runtime.js";
import type { Opportunity } from "../types.js";

const file = process.argv[2] ?? process.env.REPLAY_FILE;
if (!file) {
  console.error("Usage: npx tsx src/scripts/backtest.ts <ticks.csv>");
  process.exit(1);
}

const config = loadConfig({ ...process.env, FEED: "replay", REPLAY_FILE: file, EXECUTION_MODE: "dry-run" });

// Replay time, not wall time: cooldowns and staleness follow the recorded ticks.
let replayNow = 0;
const approved = new Map<string, Opportunity>();
const { pipeline, bus } = createRuntime(config, {
  clock: () => replayNow,
  onQuote: (quote) => {
    replayNow = Math.max(replayNow, quote.observedAt);
  },
  onApproved: (opportunity) => approved.set(opportunity.id, opportunity),
  persist: false,
});

let realizedEdge = 0;
let filledNotional = 0;
bus.onResult((result) => {
  const opportunity = approved.get(result.opportunityId);
  if (result.outcome !== "Confirmed" || !opportunity) return;
  const price = result.realizedPrice ?? opportunity.quotePrice;
  const size = result.filledSize ?? 0;
  const perShare = opportunity.direction === "BUY" ? opportunity.fairValue - price : price - opportunity.fairValue;
  realizedEdge += perShare * size;
  filledNotional += price * size;
});

await pipeline.resume(null);
pipeline.start();
await pipeline.finished();

const status = pipeline.getStatus();
const row = (label: string, value: string | number) => `  ${chalk.cyan(label.padEnd(26))} ${value}`;
const edge = realizedEdge >= 0 ? chalk.green(`+${realizedEdge.toFixed(4)}`) : chalk.red(realizedEdge.toFixed(4));

console.log(chalk.bold(`Backtest of ${file}`) + chalk.dim(` (${config.valuationModel} model)`));
console.log(
  [
    row("Ticks processed:", status.ticksProcessed),
    row("Opportunities:", status.opportunitiesDetected),
    row("Approved:", status.approvals),
    ...Object.entries(status.rejections).map(([reason, count]) => row(`Rejected ${reason}:`, count)),
    row("Confirmed/failed/dropped:", `${status.confirmed}/${status.failed}/${status.dropped}`),
    row("Filled notional:", filledNotional.toFixed(2)),
    row("Realized edge:", edge),
  ].join("\n"),
);
