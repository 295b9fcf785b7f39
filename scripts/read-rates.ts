#!/usr/bin/env npx tsx

/**
 * Print the last 24 hours of hourly rates for a facility
 *
 * Usage:
 *   npm run read-rates -- oxnard
 *   npm run read-rates -- oxnard --json
 */

import { Command } from "commander";
import { config } from "dotenv";
import {
  HOURLY_RATE_SERIES,
  type HourlyRate,
  type HourlyRates,
} from "../lib/atlas/types";
import { formatTimeISO } from "../lib/date-utils";
import { toJson } from "../lib/json";
import { RatesReader } from "../lib/rates/rates-reader";

config({ path: ".env.local" });

interface CliOptions {
  json: boolean;
  debug: boolean;
}

const RATE_TITLES: Record<keyof HourlyRates, string> = {
  usageRate: "Usage Rate",
  maximumDemandCharge: "Maximum Demand Charge",
  timeOfUseDemandCharge: "Time of Use Demand Charge",
  dayAheadMarketRate: "Day Ahead Market Rate",
  realTimeMarketRate: "Real Time Market Rate",
};

function printRates(title: string, rates: HourlyRate[]) {
  if (rates.length === 0) return;
  console.log(title);
  for (const rate of rates) {
    console.log(`  ${formatTimeISO(rate.start)}: ${rate.rate}`);
  }
}

async function main() {
  const program = new Command();
  program
    .name("read-rates")
    .description("Print the last 24 hours of hourly rates for a facility")
    .argument("<facility>", "Facility short name")
    .option("--json", "Print JSON", false)
    .option("--debug", "Log requests", false)
    .parse();

  const options = program.opts<CliOptions>();
  const facility = String(program.args[0]);

  const reader = new RatesReader({ debug: options.debug });
  const result = await reader.read({ facilities: [facility] });
  const entry = result.facilities[0];

  if (options.json) {
    console.log(toJson(entry));
    return;
  }

  if (!entry || entry.status === "failed") {
    console.error(entry ? entry.error.message : `Facility ${facility} not found`);
    process.exit(1);
  }

  console.log(`Rates for ${entry.facility.displayName}`);
  for (const series of HOURLY_RATE_SERIES) {
    printRates(RATE_TITLES[series], entry.rates[series]);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
