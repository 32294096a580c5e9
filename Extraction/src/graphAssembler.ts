import type { CrawledLine, CrawledStation, CrawlResult } from "./crawlEngine.js";
import { AssemblyError } from "./errors.js";
import type { ConnectionDocument, LineDocument, NetworkDocument, StationDocument } from "./types.js";

export function assemble(result: CrawlResult): NetworkDocument {
    const lines = result.lines.filter(line => !result.excluded.has(line.ref.id));
    if (lines.length === 0) {
        throw new AssemblyError(result.system.ref.id, `no lines found for system ${result.system.ref.id}`);
    }

    const keptLines = new Set(lines.map(line => line.localId));
    const stations = result.stations.filter(
        station => !result.excluded.has(station.ref.id) && keptLines.has(station.lineLocalId)
    );

    // keep only connections whose endpoints survived
    const localIds = new Map(stations.map(station => [station.ref.id, station.localId] as const));

    return {
        id: result.system.localId,
        stations: stations.map(station => stationDocument(station, localIds)),
        lines: lines.map(lineDocument),
    };
}

function stationDocument(station: CrawledStation, localIds: ReadonlyMap<string, string>): StationDocument {
    const { attributes } = station;

    const connections: ConnectionDocument[] = [];
    const targets = new Set<string>();
    for (const connection of station.connections) {
        const to = localIds.get(connection.targetId);
        if (!to || to === station.localId || targets.has(to)) continue;
        targets.add(to);
        connections.push({ to, type: connection.type });
    }

    const doc: StationDocument = {
        id: station.localId,
        line: station.lineLocalId,
        names: { ...attributes.names },
        open_time: attributes.openTime ?? "",
        geo_positions: attributes.geoPosition
            ? [String(attributes.geoPosition.lat), String(attributes.geoPosition.lon)]
            : [],
        connections,
        site_links: Object.entries(attributes.siteLinks).map(([site, title]) => ({ [site]: title })),
    };
    if (attributes.status) doc.status = attributes.status;
    return doc;
}

function lineDocument(line: CrawledLine): LineDocument {
    const doc: LineDocument = { id: line.localId, names: { ...line.attributes.names } };
    if (line.attributes.color) doc.color = line.attributes.color;
    return doc;
}
