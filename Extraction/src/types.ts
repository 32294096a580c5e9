import type { ResolutionError } from "./errors.js";

export type EntityKind = "STATION" | "LINE" | "SYSTEM";

export type EntityRef = {
    readonly id: string;    // Wikidata id, e.g. "Q5499"
    readonly kind: EntityKind;
};

export function entityRef(id: string, kind: EntityKind): EntityRef {
    return Object.freeze({ id, kind });
}

export type ConnectionType = "adjacent" | "transfer";

export type StationStatus = "planned" | "under_construction" | "closed";

export type GeoPosition = {
    lat: number;
    lon: number;
};

type ResolvedBase = {
    ref: EntityRef;
    names: Record<string, string>;        // language code -> label
    siteLinks: Record<string, string>;    // site, e.g. "enwiki" -> page title
    issues: ResolutionError[];            // attributes that were present but unreadable
};

export type ResolvedStation = ResolvedBase & {
    kind: "STATION";
    geoPosition?: GeoPosition;
    openTime?: string;
    status?: StationStatus;
};

export type ResolvedLine = ResolvedBase & {
    kind: "LINE";
    color?: string;
};

export type ResolvedSystem = ResolvedBase & {
    kind: "SYSTEM";
};

export type ResolvedAttributes = ResolvedStation | ResolvedLine | ResolvedSystem;

// -------------------------------
// Output document
// -------------------------------

export type ConnectionDocument = {
    to: string;
    type: ConnectionType;
};

export type StationDocument = {
    id: string;             // "<line id>/<short id>"
    line: string;
    names: Record<string, string>;
    open_time: string;
    geo_positions: [string, string] | [];
    connections: ConnectionDocument[];
    site_links: Record<string, string>[];
    status?: StationStatus;
};

export type LineDocument = {
    id: string;
    names: Record<string, string>;
    color?: string;
};

export type NetworkDocument = {
    id: string;
    stations: StationDocument[];
    lines: LineDocument[];
};
