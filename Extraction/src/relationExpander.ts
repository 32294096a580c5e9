import { ExpansionError } from "./errors.js";
import { entityRef, type EntityKind, type EntityRef } from "./types.js";
import { EntityNotFoundError, type WikidataSource } from "./wikidata/client.js";
import {
    P_ADJACENT_STATION,
    P_CONNECTING_LINE,
    P_HAS_PART,
    P_INTERCHANGE_STATION,
    P_PART_OF,
    P_TERMINUS,
    P_TRANSPORT_NETWORK,
} from "./wikidata/properties.js";

export type RelationKind =
    | "STATIONS_OF_LINE"
    | "LINES_OF_STATION"
    | "ADJACENT_STATIONS"
    | "CONNECTING_STATIONS"
    | "LINES_OF_SYSTEM"
    | "SYSTEMS_OF_ENTITY";

// Several properties per relation: Wikidata editors model the same edge in more than one way.
const RELATIONS: Record<RelationKind, { properties: string[]; target: EntityKind }> = {
    STATIONS_OF_LINE: { properties: [P_HAS_PART, P_TERMINUS], target: "STATION" },
    LINES_OF_STATION: { properties: [P_CONNECTING_LINE], target: "LINE" },
    ADJACENT_STATIONS: { properties: [P_ADJACENT_STATION], target: "STATION" },
    CONNECTING_STATIONS: { properties: [P_INTERCHANGE_STATION], target: "STATION" },
    LINES_OF_SYSTEM: { properties: [P_HAS_PART], target: "LINE" },
    SYSTEMS_OF_ENTITY: { properties: [P_TRANSPORT_NETWORK, P_PART_OF], target: "SYSTEM" },
};

export class RelationExpander {
    constructor(private readonly source: WikidataSource) {}

    /**
     * Entities related to `ref`, without repeats, in property then claim order.
     * Fetch failures surface as {@link ExpansionError} while iterating.
     */
    async *expand(ref: EntityRef, relation: RelationKind): AsyncGenerator<EntityRef> {
        const { properties, target } = RELATIONS[relation];
        const seen = new Set<string>();

        for (const property of properties) {
            let ids: string[];
            try {
                ids = await this.source.fetchOutgoingRelations(ref.id, property);
            } catch (err) {
                const kind = err instanceof EntityNotFoundError ? "NotFound" : "Transport";
                throw new ExpansionError(kind, ref.id, `${relation} of ${ref.id} failed`, { cause: err });
            }

            for (const id of ids) {
                if (seen.has(id)) continue;
                seen.add(id);
                yield entityRef(id, target);
            }
        }
    }
}

export async function collect<T>(sequence: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of sequence) items.push(item);
    return items;
}
