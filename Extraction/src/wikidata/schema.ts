import { z } from "zod";
import { ITEM_PREFIX, P_END_TIME } from "./properties.js";

// The API serializes an empty map as [] for some entities.
function map<T extends z.ZodTypeAny>(value: T) {
    return z.preprocess(
        raw => (Array.isArray(raw) && raw.length === 0 ? {} : raw),
        z.record(value),
    );
}

export const Snak = z.object({
    snaktype: z.string(),
    property: z.string(),
    datavalue: z.object({
        type: z.string(),
        value: z.unknown(),
    }).optional(),
});
export type Snak = z.infer<typeof Snak>;

export const Claim = z.object({
    mainsnak: Snak,
    rank: z.string().optional(),
    qualifiers: map(z.array(Snak)).optional(),
});
export type Claim = z.infer<typeof Claim>;

export const RawEntity = z.object({
    id: z.string(),
    missing: z.string().optional(),
    labels: map(z.object({ language: z.string(), value: z.string() })).default({}),
    descriptions: map(z.object({ language: z.string(), value: z.string() })).default({}),
    sitelinks: map(z.object({ site: z.string(), title: z.string() })).default({}),
    claims: map(z.array(Claim)).default({}),
});
export type RawEntity = z.infer<typeof RawEntity>;

export const EntitiesResponse = z.object({
    entities: z.record(RawEntity).optional(),
    error: z.object({
        code: z.string(),
        info: z.string().optional(),
    }).optional(),
});

const EntityIdValue = z.object({
    id: z.string().optional(),
    "numeric-id": z.number().optional(),
});

export function snakValue(snak: Snak): unknown {
    if (snak.snaktype !== "value" || !snak.datavalue) return undefined;
    return snak.datavalue.value;
}

/**
 * Claims for a property that still hold: not deprecated and without an end time.
 */
export function currentClaims(entity: RawEntity, property: string): Claim[] {
    const claims = entity.claims[property] ?? [];
    return claims.filter(claim => claim.rank !== "deprecated" && !claim.qualifiers?.[P_END_TIME]);
}

export function firstValue(entity: RawEntity, property: string): unknown {
    for (const claim of currentClaims(entity, property)) {
        const value = snakValue(claim.mainsnak);
        if (value !== undefined) return value;
    }
    return undefined;
}

export function qualifierValue(claim: Claim, property: string): unknown {
    for (const snak of claim.qualifiers?.[property] ?? []) {
        const value = snakValue(snak);
        if (value !== undefined) return value;
    }
    return undefined;
}

export function entityIdOf(value: unknown): string | undefined {
    const parsed = EntityIdValue.safeParse(value);
    if (!parsed.success) return undefined;
    if (parsed.data.id) return parsed.data.id;
    const numeric = parsed.data["numeric-id"];
    return numeric === undefined ? undefined : ITEM_PREFIX + numeric;
}

export function relationTargets(entity: RawEntity, property: string): string[] {
    const ids: string[] = [];
    for (const claim of currentClaims(entity, property)) {
        const id = entityIdOf(snakValue(claim.mainsnak));
        if (id) ids.push(id);
    }
    return ids;
}

export function normalizeEntityId(id: string): string {
    const trimmed = id.trim();
    if (/^\d+$/.test(trimmed)) return ITEM_PREFIX + trimmed;
    if (/^q\d+$/.test(trimmed)) return trimmed.toUpperCase();
    return trimmed;
}
