import { CrawlEngine, type Diagnostic } from "./crawlEngine.js";
import { EntityResolver } from "./entityResolver.js";
import { assemble } from "./graphAssembler.js";
import { IdentifierAssigner, type IdStrategy } from "./identifierAssigner.js";
import { RelationExpander } from "./relationExpander.js";
import type { NetworkDocument } from "./types.js";
import type { WikidataSource } from "./wikidata/client.js";
import { normalizeEntityId } from "./wikidata/schema.js";

export type HarvestOptions = {
    systemId: string;
    stationIds?: string[];
    idStrategy?: IdStrategy;
    languages?: string[];
    maxStations?: number;
    now?: () => Date;
    log?: (message: string) => void;
};

export type HarvestResult = {
    document: NetworkDocument;
    diagnostics: Diagnostic[];
};

/**
 * Crawl one transit system and build its network document. Throws
 * SeedError when a seed cannot be resolved and AssemblyError when no line
 * of the system survives.
 */
export async function harvestNetwork(source: WikidataSource, options: HarvestOptions): Promise<HarvestResult> {
    const systemId = normalizeEntityId(options.systemId);
    const stationIds = [...new Set((options.stationIds ?? []).map(normalizeEntityId))];

    const engine = new CrawlEngine(
        new EntityResolver(source, { now: options.now }),
        new RelationExpander(source),
        new IdentifierAssigner(options.idStrategy, options.languages),
        { maxStations: options.maxStations, log: options.log },
    );

    const result = await engine.crawl(systemId, stationIds);
    return { document: assemble(result), diagnostics: result.diagnostics };
}
