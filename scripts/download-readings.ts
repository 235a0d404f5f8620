#!/usr/bin/env -S npx tsx
/**
 * Bulk readings download
 * Fetches long histories for every channel in a CSV and writes period values as CSV.
 *
 * Usage:
 *   npx tsx scripts/download-readings.ts [options]
 *
 * Options:
 *   --csv <path>          Channel list with an `id` column (default: channels.csv)
 *   --out <path>          Output CSV (default: readings.csv)
 *   --days <n>            History length ending today, in days (default: 365)
 *   --window-days <n>     Largest single request, in days (default: 365)
 *   --period <type>       halfHour | hour | day | week | month (default: halfHour)
 *   --dry-run             Just parse the channel list, no API calls
 *
 * Connection settings come from DCS_URL, DCS_USERNAME and DCS_PASSWORD.
 */

import { appendFileSync, readFileSync, writeFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { parseChannelId, formatChannelId } from "../src/channels.js";
import { loadConfig } from "../src/config.js";
import { clientOptions, withDcsClient } from "../src/dcsClient.js";
import { errMessage } from "../src/errors.js";
import { periodValues } from "../src/periodData.js";
import { formatUtc, MS_PER_DAY } from "../src/time.js";
import { PERIOD_TYPES, type PeriodType } from "../src/types.js";
import { floorToPeriod } from "../src/windows.js";

// ─────────────────────────────────────────────────────────────────────────────
// CSV
// ─────────────────────────────────────────────────────────────────────────────

type ChannelRow = {
  id: string;
};

function loadChannels(content: string): string[] {
  const rows = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  }) as ChannelRow[];

  const ids: string[] = [];
  for (const row of rows) {
    if (!row.id) continue;
    ids.push(formatChannelId(parseChannelId(row.id)));
  }
  return ids;
}

function argValue(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i >= 0 ? args[i + 1] : undefined;
}

function positiveInt(raw: string | undefined, fallback: number, flag: string): number {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n <= 0) throw new Error(`${flag} must be a positive integer`);
  return n;
}

function isPeriodType(v: string): v is PeriodType {
  return (PERIOD_TYPES as readonly string[]).includes(v);
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

async function main() {
  const args = process.argv.slice(2);

  const csvPath = argValue(args, "--csv") ?? "channels.csv";
  const outPath = argValue(args, "--out") ?? "readings.csv";
  const days = positiveInt(argValue(args, "--days"), 365, "--days");
  const windowDays = positiveInt(argValue(args, "--window-days"), 365, "--window-days");
  const period = argValue(args, "--period") ?? "halfHour";
  const dryRun = args.includes("--dry-run");

  if (!isPeriodType(period)) throw new Error(`--period must be one of ${PERIOD_TYPES.join(", ")}`);

  console.log(`Loading channels from: ${csvPath}`);
  const channels = loadChannels(readFileSync(csvPath, "utf-8"));
  console.log(`Total channels loaded: ${channels.length}`);

  if (dryRun) {
    console.log("[dry-run] Skipping downloads.");
    return;
  }

  const today = new Date();
  // Windows must start and end on period boundaries.
  const end = floorToPeriod(floorToPeriod(today, "day"), period);
  const start = floorToPeriod(new Date(end.getTime() - days * MS_PER_DAY), period);

  writeFileSync(outPath, stringify([["id", "timestamp", "value", "status", "periodValue"]]));

  const config = loadConfig();
  await withDcsClient(clientOptions(config), async (dcs) => {
    for (let i = 0; i < channels.length; i++) {
      const id = channels[i];
      if (id === undefined) continue;
      const progress = `[${i + 1}/${channels.length}]`;

      try {
        const result = await dcs.largeReadings(
          { channel: id, start, end, periodType: period, stream: true },
          windowDays * MS_PER_DAY,
        );

        let written = 0;
        let batch: unknown[][] = [];
        for await (const r of periodValues(result.readings, period)) {
          batch.push([id, formatUtc(r.timestamp), r.value, r.status, r.periodValue ?? ""]);
          if (batch.length >= 1000) {
            appendFileSync(outPath, stringify(batch));
            written += batch.length;
            batch = [];
          }
        }
        if (batch.length > 0) {
          appendFileSync(outPath, stringify(batch));
          written += batch.length;
        }
        console.log(`${progress} ${id} (${result.name ?? "unnamed"}): ${written} rows`);
      } catch (e) {
        console.error(`${progress} ${id}: ✗ ${errMessage(e)}`);
      }
    }
  });

  console.log(`\n📁 Readings saved to: ${outPath}`);
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
