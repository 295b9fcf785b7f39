#!/usr/bin/env npx tsx

/**
 * List the devices of every facility, grouped by device kind
 *
 * Usage:
 *   npm run list-devices
 *   npm run list-devices -- --json
 */

import { Command } from "commander";
import { config } from "dotenv";
import { createAtlasClient } from "../lib/atlas/credentials";
import { listAllDevices } from "../lib/atlas/device-index";
import { toJson } from "../lib/json";

config({ path: ".env.local" });

interface CliOptions {
  json: boolean;
  debug: boolean;
}

async function main() {
  const program = new Command();
  program
    .name("list-devices")
    .description("List devices and their point aliases for every facility")
    .option("--json", "Print JSON", false)
    .option("--debug", "Log requests", false)
    .parse();

  const options = program.opts<CliOptions>();
  const client = createAtlasClient({ debug: options.debug });
  const devices = await listAllDevices(client);

  if (options.json) {
    console.log(toJson(devices));
    return;
  }

  for (const [facilityName, kinds] of devices) {
    console.log(`Facility: ${facilityName}`);
    for (const [kind, byName] of kinds) {
      console.log(`  ${kind}:`);
      for (const [deviceName, entry] of byName) {
        console.log(`    ${deviceName}`);
        for (const prop of entry.properties.values()) {
          console.log(`      ${prop.name} (${prop.kind} ${prop.bias}): ${prop.alias}`);
        }
        for (const [label, connections] of [
          ["upstream", entry.upstream],
          ["downstream", entry.downstream],
        ] as const) {
          for (const [connectionKind, deviceId] of Object.entries(connections ?? {})) {
            console.log(`      ${label} ${connectionKind}: ${deviceId}`);
          }
        }
      }
    }
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
