import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";
import { preferredName } from "./nameUtils.js";
import type { NetworkDocument } from "./types.js";

export type StationRow = {
    id: string;
    line: string;
    name: string;
    lat: string;
    lon: string;
    open_time: string;
};

export type ConnectionRow = {
    from: string;
    to: string;
    type: string;
};

export function stationRows(doc: NetworkDocument, languages: string[] = []): StationRow[] {
    return doc.stations.map(station => {
        const geo: string[] = station.geo_positions;
        return {
            id: station.id,
            line: station.line,
            name: preferredName(station.names, languages)?.[1] ?? "",
            lat: geo[0] ?? "",
            lon: geo[1] ?? "",
            open_time: station.open_time,
        };
    });
}

export function connectionRows(doc: NetworkDocument): ConnectionRow[] {
    return doc.stations.flatMap(station =>
        station.connections.map(connection => ({ from: station.id, to: connection.to, type: connection.type }))
    );
}

/**
 * Writes `<id>.json` plus station and connection tables; returns the written paths.
 */
export function writeNetwork(doc: NetworkDocument, outDir: string, languages: string[] = []): string[] {
    fs.mkdirSync(outDir, { recursive: true });

    const jsonPath = path.join(outDir, `${doc.id}.json`);
    const stationsPath = path.join(outDir, `stations_${doc.id}.csv`);
    const connectionsPath = path.join(outDir, `connections_${doc.id}.csv`);

    fs.writeFileSync(jsonPath, JSON.stringify(doc, null, 4));
    fs.writeFileSync(stationsPath, Papa.unparse(stationRows(doc, languages)));
    fs.writeFileSync(connectionsPath, Papa.unparse(connectionRows(doc)));

    return [jsonPath, stationsPath, connectionsPath];
}
