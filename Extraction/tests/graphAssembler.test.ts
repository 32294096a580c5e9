import { describe, expect, it } from "vitest";
import type { CrawledLine, CrawledStation, CrawlResult } from "../src/crawlEngine.js";
import { AssemblyError } from "../src/errors.js";
import { assemble } from "../src/graphAssembler.js";
import { entityRef, type ResolvedStation } from "../src/types.js";

function line(id: string, color?: string): CrawledLine {
    return {
        ref: entityRef(id, "LINE"),
        localId: id,
        attributes: { kind: "LINE", ref: entityRef(id, "LINE"), names: { en: id }, siteLinks: {}, issues: [], color },
    };
}

function station(id: string, lineId: string, extra: Partial<ResolvedStation> = {}): CrawledStation {
    return {
        ref: entityRef(id, "STATION"),
        localId: `${lineId}/${id}`,
        lineLocalId: lineId,
        attributes: {
            kind: "STATION",
            ref: entityRef(id, "STATION"),
            names: { en: id },
            siteLinks: {},
            issues: [],
            ...extra,
        },
        connections: [],
    };
}

function result(lines: CrawledLine[], stations: CrawledStation[], excluded: string[] = []): CrawlResult {
    const ref = entityRef("S1", "SYSTEM");
    return {
        system: { ref, localId: "S1", attributes: { kind: "SYSTEM", ref, names: {}, siteLinks: {}, issues: [] } },
        lines,
        stations,
        excluded: new Set(excluded),
        diagnostics: [],
    };
}

describe("assemble", () => {
    it("writes station attributes", () => {
        const a = station("A", "L1", {
            geoPosition: { lat: 55.74, lon: 37.6 },
            openTime: "1935.05.15 00:00:00",
            status: "closed",
            siteLinks: { enwiki: "Alpha", ruwiki: "Альфа" },
        });

        const doc = assemble(result([line("L1", "#FF0000")], [a]));

        expect(doc).toStrictEqual({
            id: "S1",
            lines: [{ id: "L1", names: { en: "L1" }, color: "#FF0000" }],
            stations: [{
                id: "L1/A",
                line: "L1",
                names: { en: "A" },
                open_time: "1935.05.15 00:00:00",
                geo_positions: ["55.74", "37.6"],
                connections: [],
                site_links: [{ enwiki: "Alpha" }, { ruwiki: "Альфа" }],
                status: "closed",
            }],
        });
    });

    it("keeps the first connection to each target and drops self links", () => {
        const a = station("A", "L1");
        const b = station("B", "L1");
        a.connections.push(
            { targetId: "B", type: "adjacent" },
            { targetId: "A", type: "transfer" },
            { targetId: "B", type: "transfer" },
        );

        const doc = assemble(result([line("L1")], [a, b]));

        expect(doc.stations[0].connections).toEqual([{ to: "L1/B", type: "adjacent" }]);
    });

    it("drops connections to stations it does not keep", () => {
        const a = station("A", "L1");
        const c = station("C", "L2");
        a.connections.push({ targetId: "C", type: "adjacent" }, { targetId: "X", type: "adjacent" });

        const doc = assemble(result([line("L1"), line("L2")], [a, c], ["L2"]));

        expect(doc.lines.map(l => l.id)).toEqual(["L1"]);
        expect(doc.stations.map(s => s.id)).toEqual(["L1/A"]);
        expect(doc.stations[0].connections).toEqual([]);
    });

    it("drops excluded stations", () => {
        const doc = assemble(result([line("L1")], [station("A", "L1"), station("B", "L1")], ["B"]));

        expect(doc.stations.map(s => s.id)).toEqual(["L1/A"]);
    });

    it("throws when no line is left", () => {
        expect(() => assemble(result([line("L1")], [], ["L1"]))).toThrow(AssemblyError);
        expect(() => assemble(result([], []))).toThrow("no lines found for system S1");
    });
});
