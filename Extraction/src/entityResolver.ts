import { z } from "zod";
import { ResolutionError } from "./errors.js";
import { extractLineName, statusFromDescriptions } from "./nameUtils.js";
import type {
    EntityRef,
    GeoPosition,
    ResolvedAttributes,
    ResolvedLine,
    ResolvedStation,
    ResolvedSystem,
} from "./types.js";
import { entityRef } from "./types.js";
import { EntityNotFoundError, type WikidataSource } from "./wikidata/client.js";
import {
    P_COLOR,
    P_COMPLEX_COLOR,
    P_COORDINATES,
    P_DATE_OF_OFFICIAL_OPENING,
} from "./wikidata/properties.js";
import { currentClaims, firstValue, qualifierValue, type RawEntity } from "./wikidata/schema.js";

const Coordinate = z.object({
    latitude: z.number(),
    longitude: z.number(),
});

const TimeValue = z.object({ time: z.string() });

const HEX_COLOR = /^[0-9A-Fa-f]{6}$/;

// "+1935-05-15T00:00:00Z"; precision below a day leaves month/day as "00"
const WIKIDATA_TIME = /^\+(\d{4,})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

export type ResolverOptions = {
    now?: () => Date;
};

type Extracted<T> = { value?: T; issue?: string };

/**
 * Turns raw Wikidata entities into the attributes the crawl cares about.
 * Unreadable attributes are dropped and reported in `issues`; only a missing
 * entity or a failed fetch is thrown.
 */
export class EntityResolver {
    constructor(private readonly source: WikidataSource, private readonly options: ResolverOptions = {}) {}

    resolve(ref: EntityRef): Promise<ResolvedAttributes> {
        switch (ref.kind) {
            case "STATION": return this.resolveStation(ref.id);
            case "LINE": return this.resolveLine(ref.id);
            case "SYSTEM": return this.resolveSystem(ref.id);
        }
    }

    async resolveStation(id: string): Promise<ResolvedStation> {
        const ref = entityRef(id, "STATION");
        const entity = await this.fetch(ref);
        const station: ResolvedStation = { kind: "STATION", ...common(ref, entity) };

        const geo = readGeoPosition(entity);
        station.geoPosition = this.keep(station, geo);

        const opening = readOpenTime(entity);
        const openTime = this.keep(station, opening);
        station.openTime = openTime?.text;

        const descriptions = Object.fromEntries(
            Object.entries(entity.descriptions).map(([language, d]) => [language, d.value])
        );
        station.status = statusFromDescriptions(descriptions);
        if (openTime && openTime.date.getTime() > this.now().getTime()) {
            station.status = "under_construction";
        }

        return station;
    }

    async resolveLine(id: string): Promise<ResolvedLine> {
        const ref = entityRef(id, "LINE");
        const entity = await this.fetch(ref);
        const line: ResolvedLine = { kind: "LINE", ...common(ref, entity) };

        for (const [language, name] of Object.entries(line.names)) {
            line.names[language] = extractLineName(name, language);
        }
        line.color = this.keep(line, readColor(entity));

        return line;
    }

    async resolveSystem(id: string): Promise<ResolvedSystem> {
        const ref = entityRef(id, "SYSTEM");
        const entity = await this.fetch(ref);
        return { kind: "SYSTEM", ...common(ref, entity) };
    }

    private async fetch(ref: EntityRef): Promise<RawEntity> {
        try {
            return await this.source.fetchEntity(ref.id);
        } catch (err) {
            if (err instanceof EntityNotFoundError) {
                throw new ResolutionError("NotFound", ref.id, `${ref.kind.toLowerCase()} ${ref.id} not found`, { cause: err });
            }
            throw new ResolutionError("Transport", ref.id, `could not fetch ${ref.id}`, { cause: err });
        }
    }

    private keep<T>(target: ResolvedAttributes, extracted: Extracted<T>): T | undefined {
        if (extracted.issue) {
            target.issues.push(new ResolutionError("MalformedAttribute", target.ref.id, extracted.issue));
        }
        return extracted.value;
    }

    private now(): Date {
        return this.options.now ? this.options.now() : new Date();
    }
}

function common(ref: EntityRef, entity: RawEntity): Pick<ResolvedSystem, "ref" | "names" | "siteLinks" | "issues"> {
    const names: Record<string, string> = {};
    for (const [language, label] of Object.entries(entity.labels)) {
        if (label.value) names[language] = label.value;
    }

    const siteLinks: Record<string, string> = {};
    for (const [site, link] of Object.entries(entity.sitelinks)) {
        if (link.title) siteLinks[site] = link.title;
    }

    const issues: ResolutionError[] = [];
    return { ref, names, siteLinks, issues };
}

function readGeoPosition(entity: RawEntity): Extracted<GeoPosition> {
    const value = firstValue(entity, P_COORDINATES);
    if (value === undefined) return {};
    const parsed = Coordinate.safeParse(value);
    if (!parsed.success) return { issue: "coordinate location is not a latitude/longitude pair" };
    return { value: { lat: parsed.data.latitude, lon: parsed.data.longitude } };
}

function readOpenTime(entity: RawEntity): Extracted<{ text: string; date: Date }> {
    const value = firstValue(entity, P_DATE_OF_OFFICIAL_OPENING);
    if (value === undefined) return {};
    const parsed = TimeValue.safeParse(value);
    if (!parsed.success) return { issue: "date of official opening is not a time value" };
    const { time } = parsed.data;
    const m = WIKIDATA_TIME.exec(time);
    if (!m) return { issue: "date of official opening is not a time value" };

    const year = Number(m[1]);
    if (year > 9999) return { issue: `date of official opening has year ${year}` };
    const month = m[2] === "00" ? "01" : m[2];
    const day = m[3] === "00" ? "01" : m[3];
    const yyyy = String(year).padStart(4, "0");

    // Date rolls an out-of-range part over into the next one; a rolled date is not the stated date.
    const parts = [year, Number(month) - 1, Number(day), Number(m[4]), Number(m[5]), Number(m[6])];
    const date = new Date(0);
    date.setUTCFullYear(parts[0], parts[1], parts[2]);
    date.setUTCHours(parts[3], parts[4], parts[5]);
    const actual = [
        date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(),
        date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds(),
    ];
    if (Number.isNaN(date.getTime()) || actual.some((part, i) => part !== parts[i])) {
        return { issue: `date of official opening ${time} is not a valid date` };
    }

    return {
        value: {
            text: `${yyyy}.${month}.${day} ${m[4]}:${m[5]}:${m[6]}`,
            date,
        },
    };
}

function readColor(entity: RawEntity): Extracted<string> {
    let color: Extracted<string> = {};

    const plain = firstValue(entity, P_COLOR);
    if (plain !== undefined) color = hexColor(plain);

    // A complex color carries the actual sRGB value as a qualifier.
    const complex = currentClaims(entity, P_COMPLEX_COLOR)[0];
    const qualified = complex ? qualifierValue(complex, P_COLOR) : undefined;
    if (qualified !== undefined) color = hexColor(qualified);

    return color;
}

function hexColor(value: unknown): Extracted<string> {
    if (typeof value === "string" && HEX_COLOR.test(value)) return { value: "#" + value };
    return { issue: `color ${JSON.stringify(value)} is not a hex triplet` };
}
