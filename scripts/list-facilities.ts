#!/usr/bin/env npx tsx

/**
 * List the facilities the refresh token's user can see
 *
 * Usage:
 *   npm run list-facilities
 *   npm run list-facilities -- --json
 */

import { Command } from "commander";
import { config } from "dotenv";
import { createAtlasClient } from "../lib/atlas/credentials";
import { toJson } from "../lib/json";

config({ path: ".env.local" });

interface CliOptions {
  json: boolean;
  debug: boolean;
}

async function main() {
  const program = new Command();
  program
    .name("list-facilities")
    .description("List accessible facilities with their organization and agent ids")
    .option("--json", "Print JSON", false)
    .option("--debug", "Log requests", false)
    .parse();

  const options = program.opts<CliOptions>();
  const client = createAtlasClient({ debug: options.debug });
  const facilities = await client.listFacilities();

  if (options.json) {
    console.log(toJson(facilities));
    return;
  }

  for (const facility of facilities) {
    console.log(facility.displayName);
    console.log(`  Organization ID: ${facility.organizationId}`);
    console.log(`  Agent ID: ${facility.agents[0]?.agentId ?? "(none)"}`);
    console.log(`  Short name: ${facility.shortName}`);
    console.log(`  Address: ${facility.address}`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
