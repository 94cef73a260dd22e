#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Usage:
 *   npx ts-node src/cli.ts <START> <END> [--sequential] [--compact] [--timeout=<ms>]
 *
 * START and END are YYYY-MM-DD dates (inclusive). Credentials are read from
 * environment variables (see .env.example); a platform whose credentials are
 * not configured is skipped.
 */

import path from "path";
import fs from "fs";
import { Aggregator } from "./aggregator";
import { createGoogleAdsClient } from "./clients/googleAdsClient";
import { createMetaAdsClient } from "./clients/metaAdsClient";
import {
  MAX_TIMEOUT_MS,
  loadGoogleCredentialsFromEnv,
  loadMetaCredentialsFromEnv,
  validateDateRange,
} from "./config";
import { ValidationError } from "./errors";
import type { PlatformClient } from "./types";

export interface CliOptions {
  startDate: string;
  endDate: string;
  parallel: boolean;
  pretty: boolean;
  timeoutMs?: number;
}

const USAGE =
  "Usage:\n" +
  "  npx ts-node src/cli.ts <START> <END> [--sequential] [--compact] [--timeout=<ms>]\n";

// ─── Parse CLI arguments ─────────────────────────────────────────────────────

/** Parses the arguments after the script name. Throws a ValidationError on bad usage. */
export function parseArgs(args: string[]): CliOptions {
  const positional: string[] = [];
  const options: CliOptions = { startDate: "", endDate: "", parallel: true, pretty: true };

  for (const arg of args) {
    if (arg === "--sequential") {
      options.parallel = false;
    } else if (arg === "--compact") {
      options.pretty = false;
    } else if (arg.startsWith("--timeout=")) {
      const raw = arg.slice("--timeout=".length);
      const timeoutMs = Number(raw);
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
        throw new ValidationError(
          `Invalid --timeout: "${raw}". Expected a positive integer up to ${MAX_TIMEOUT_MS}.`
        );
      }
      options.timeoutMs = timeoutMs;
    } else if (arg.startsWith("--")) {
      throw new ValidationError(`Unknown option: ${arg}\n${USAGE}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    throw new ValidationError(USAGE);
  }

  const [startDate, endDate] = positional;
  validateDateRange(startDate, endDate);

  return { ...options, startDate, endDate };
}

// ─── Clients from the environment ────────────────────────────────────────────

const CLIENT_FACTORIES: Array<{ label: string; create: () => PlatformClient }> = [
  { label: "Meta", create: () => createMetaAdsClient(loadMetaCredentialsFromEnv()) },
  { label: "Google Ads", create: () => createGoogleAdsClient(loadGoogleCredentialsFromEnv()) },
];

/** One client per platform whose credentials are configured */
export function buildClientsFromEnv(): PlatformClient[] {
  const clients: PlatformClient[] = [];

  for (const { label, create } of CLIENT_FACTORIES) {
    try {
      clients.push(create());
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      console.warn(`⚠  Skipping ${label}: ${err.message}`);
    }
  }

  return clients;
}

// ─── Save output to file ─────────────────────────────────────────────────────

function saveOutput(json: string, startDate: string, endDate: string): string {
  const outputDir = path.resolve(__dirname, "..", "output");

  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const fileName = `ads_report_${startDate}_${endDate}.json`;
  const filePath = path.join(outputDir, fileName);

  fs.writeFileSync(filePath, json, "utf-8");

  return filePath;
}

// ─── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    const options = parseArgs(process.argv.slice(2));
    const clients = buildClientsFromEnv();

    if (clients.length === 0) {
      throw new ValidationError(
        "No platform credentials configured. Copy .env.example to .env and fill in at least one platform."
      );
    }

    console.log("═══════════════════════════════════════════════════════");
    console.log("  Ads Aggregator – Meta + Google Ads");
    console.log("═══════════════════════════════════════════════════════");
    console.log(`  Range     : ${options.startDate} → ${options.endDate}`);
    console.log(`  Platforms : ${clients.map((client) => client.platform).join(", ")}`);
    console.log("═══════════════════════════════════════════════════════");

    const aggregator = new Aggregator(clients);
    const report = await aggregator.aggregateData(options.startDate, options.endDate, {
      parallel: options.parallel,
      timeoutMs: options.timeoutMs,
    });

    const filePath = saveOutput(
      aggregator.toJson(report, options.pretty),
      options.startDate,
      options.endDate
    );

    console.log(`💾 Output saved to: ${filePath}`);
    console.log(`   Total records: ${report.summary.total_records}`);
    console.log(`   Total spend  : ${report.summary.total_spend} (${report.summary.currencies.join(", ") || "n/a"})`);
    for (const failure of report.errors) {
      const scope = failure.campaign_id ? ` campaign ${failure.campaign_id}` : "";
      console.log(`   ✗ ${failure.platform}${scope} [${failure.code}]: ${failure.message}`);
    }
    console.log("\nDone!");
  } catch (error) {
    console.error("\n❌ Error:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
