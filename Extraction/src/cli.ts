import { Command, InvalidArgumentError, type OutputConfiguration } from "commander";
import { z } from "zod";
import type { HarvestConfig } from "./config.js";

const CliOptions = z.object({
    system: z.string().min(1),
    stations: z.array(z.string()).min(1),
    out: z.string().min(1).optional(),
    languages: z.array(z.string()).optional(),
    idStrategy: z.enum(["entity", "name"]).optional(),
    limit: z.number().int().positive().optional(),
});

export type HarvestArgs = {
    systemId: string;
    stationIds: string[];
    outDir: string;
    languages: string[];
    idStrategy: HarvestConfig["idStrategy"];
    maxStations?: number;
};

function positiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("expected a positive integer");
    return n;
}

export function createCli(): Command {
    return new Command()
        .name("transit-harvest")
        .description("Build a transit network graph from Wikidata")
        .requiredOption("-s, --system <id>", "Wikidata id of the transit system, e.g. Q5499")
        .requiredOption("--stations <ids...>", "one or more seed stations of the system")
        .option("-o, --out <dir>", "output directory (default: HARVEST_OUT_DIR)")
        .option("-l, --languages <codes...>", "local languages used for names, after English")
        .option("--id-strategy <strategy>", "entity or name (default: HARVEST_ID_STRATEGY)")
        .option("--limit <n>", "stop admitting stations after n", positiveInt)
        .exitOverride();
}

/**
 * Command line options over the environment config. Throws on bad input;
 * commander's own errors surface as CommanderError.
 */
export function parseHarvestArgs(argv: string[], config: HarvestConfig, output?: OutputConfiguration): HarvestArgs {
    const cli = createCli();
    if (output) cli.configureOutput(output);
    cli.parse(argv, { from: "user" });

    const parsed = CliOptions.safeParse(cli.opts());
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`Invalid options: ${problems.join("; ")}`);
    }

    const options = parsed.data;
    return {
        systemId: options.system,
        stationIds: options.stations,
        outDir: options.out ?? config.outDir,
        languages: options.languages ?? config.languages,
        idStrategy: options.idStrategy ?? config.idStrategy,
        maxStations: options.limit,
    };
}
