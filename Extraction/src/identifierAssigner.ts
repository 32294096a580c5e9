import { escapeId, extractLineName, extractStationName, preferredName } from "./nameUtils.js";
import type { EntityRef } from "./types.js";

export type IdStrategy = "entity" | "name";

export type NamedEntity = {
    ref: EntityRef;
    names: Record<string, string>;
};

/**
 * Run-local identifiers. Each external id gets exactly one local id, the first
 * one asked for; a later request with another owning line returns that same id.
 */
export class IdentifierAssigner {
    private readonly assigned = new Map<string, string>();
    private readonly taken = new Set<string>();

    constructor(private readonly strategy: IdStrategy = "entity", private readonly languages: string[] = []) {}

    assignSystem(entity: NamedEntity): string {
        return this.assign(entity);
    }

    assignLine(entity: NamedEntity): string {
        return this.assign(entity);
    }

    assignStation(entity: NamedEntity, lineLocalId: string): string {
        return this.assign(entity, lineLocalId);
    }

    private assign(entity: NamedEntity, lineLocalId?: string): string {
        const existing = this.assigned.get(entity.ref.id);
        if (existing) return existing;

        const base = lineLocalId ? `${lineLocalId}/${this.shortId(entity)}` : this.shortId(entity);
        let candidate = base;
        for (let n = 2; this.taken.has(candidate); n++) candidate = `${base}_${n}`;

        this.taken.add(candidate);
        this.assigned.set(entity.ref.id, candidate);
        return candidate;
    }

    private shortId(entity: NamedEntity): string {
        if (this.strategy === "name") {
            const preferred = preferredName(entity.names, this.languages);
            if (preferred) {
                const [language, name] = preferred;
                const cleaned = entity.ref.kind === "STATION"
                    ? extractStationName(name, language)
                    : extractLineName(name, language);
                const escaped = escapeId(cleaned);
                if (escaped) return escaped;
            }
        }
        return entityShortId(entity.ref.id);
    }
}

export function entityShortId(externalId: string): string {
    return externalId.replace(/[^A-Za-z0-9_-]+/g, "_") || "entity";
}
