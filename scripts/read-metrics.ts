#!/usr/bin/env npx tsx

/**
 * Read compressor suction pressure and motor current for the given facilities
 * over the last 10 minutes, one average per minute
 *
 * Usage:
 *   npm run read-metrics -- oxnard
 *   npm run read-metrics -- oxnard stockton --json
 */

import { Command } from "commander";
import { config } from "dotenv";
import { toJson } from "../lib/json";
import { DeviceKind, MetricName } from "../lib/metrics/catalog";
import { aliasMetric, catalogMetric } from "../lib/metrics/filter";
import { MetricsReader } from "../lib/metrics/metrics-reader";

config({ path: ".env.local" });

interface CliOptions {
  json: boolean;
  debug: boolean;
}

async function main() {
  const program = new Command();
  program
    .name("read-metrics")
    .description("Read compressor suction pressure and motor current")
    .argument("<facilities...>", "Facility short names")
    .option("--json", "Print JSON", false)
    .option("--debug", "Log requests", false)
    .parse();

  const options = program.opts<CliOptions>();
  const facilities = program.args;

  const reader = new MetricsReader({ debug: options.debug });
  const result = await reader.read({
    facilities,
    metrics: [
      catalogMetric(DeviceKind.COMPRESSOR, MetricName.SUCTION_PRESSURE),
      aliasMetric(DeviceKind.COMPRESSOR, ".*_motorCurrent"),
    ],
  });

  if (options.json) {
    console.log(toJson(result));
    return;
  }

  for (const facility of result.facilities) {
    console.log(facility.facility.displayName);
    if (facility.status === "failed") {
      console.log(`  ${facility.error.message}`);
      continue;
    }
    for (const [kind, group] of facility.byDeviceKind) {
      console.log(`  ${kind}`);
      for (const series of group) {
        if (series.samples.every((sample) => sample.value === null)) continue;
        console.log(`    ${series.deviceName} ${series.label}`);
        for (const sample of series.samples) {
          console.log(
            `      ${sample.timestamp.toString()}: ${sample.value ?? "-"}`,
          );
        }
      }
    }
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
