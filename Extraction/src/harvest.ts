#!/usr/bin/env node
/**
 * Entry point: crawl one transit system from Wikidata and write its network
 * as JSON plus station and connection CSVs under the output directory.
 *
 *   transit-harvest --system Q5499 --languages ru
 */

import { CommanderError } from "commander";
import { parseHarvestArgs } from "./cli.js";
import { loadConfig } from "./config.js";
import { harvestNetwork } from "./network.js";
import { writeNetwork } from "./output.js";
import { WikidataClient } from "./wikidata/client.js";

async function run() {
    const config = loadConfig();
    const args = parseHarvestArgs(process.argv.slice(2), config);

    const client = new WikidataClient({
        apiUrl: config.apiUrl,
        userAgent: config.userAgent,
        requestDelayMs: config.requestDelayMs,
        retries: config.retries,
        log: console.log,
    });

    console.log(`\n=== Harvesting ${args.systemId} ===`);
    const { document, diagnostics } = await harvestNetwork(client, {
        systemId: args.systemId,
        stationIds: args.stationIds,
        idStrategy: args.idStrategy,
        languages: args.languages,
        maxStations: args.maxStations,
        log: console.log,
    });

    for (const d of diagnostics) {
        if (d.severity === "warning") console.warn(`[warn] ${d.entityId}: ${d.message}`);
    }

    const written = writeNetwork(document, args.outDir, args.languages);
    console.log(
        `lines=${document.lines.length} stations=${document.stations.length} diagnostics=${diagnostics.length}`
    );
    for (const file of written) console.log(`Wrote ${file}`);
}

run().catch(err => {
    // --help and --version exit through here too
    if (err instanceof CommanderError) process.exit(err.exitCode);
    console.error("harvest failed:", err instanceof Error ? err.message : err);
    process.exit(1);
});
