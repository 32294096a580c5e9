import { describe, expect, it } from "vitest";
import { ExpansionError } from "../src/errors.js";
import { RelationExpander, collect } from "../src/relationExpander.js";
import { entityRef } from "../src/types.js";
import { FakeWikidata, item, itemClaims, valueClaim } from "./fixtures/fakeWikidata.js";

describe("RelationExpander", () => {
    it("merges the properties of a relation without repeats", async () => {
        const source = new FakeWikidata([
            item("L1", { claims: { P527: itemClaims("P527", "A", "B"), P559: itemClaims("P559", "B", "C") } }),
        ]);
        const expander = new RelationExpander(source);

        const stations = await collect(expander.expand(entityRef("L1", "LINE"), "STATIONS_OF_LINE"));

        expect(stations).toEqual([
            { id: "A", kind: "STATION" },
            { id: "B", kind: "STATION" },
            { id: "C", kind: "STATION" },
        ]);
    });

    it("skips deprecated and ended claims", async () => {
        const ended = valueClaim("P81", { id: "L3" }, "wikibase-entityid");
        ended.qualifiers = { P582: [{ snaktype: "value", property: "P582", datavalue: { type: "time", value: {} } }] };
        const deprecated = { ...valueClaim("P81", { id: "L2" }, "wikibase-entityid"), rank: "deprecated" };
        const source = new FakeWikidata([
            item("A", { claims: { P81: [...itemClaims("P81", "L1"), deprecated, ended] } }),
        ]);

        const lines = await collect(new RelationExpander(source).expand(entityRef("A", "STATION"), "LINES_OF_STATION"));

        expect(lines.map(ref => ref.id)).toEqual(["L1"]);
    });

    it("reads numeric entity ids", async () => {
        const claim = valueClaim("P197", { "entity-type": "item", "numeric-id": 42 }, "wikibase-entityid");
        const source = new FakeWikidata([item("A", { claims: { P197: [claim] } })]);

        const adjacent = await collect(new RelationExpander(source).expand(entityRef("A", "STATION"), "ADJACENT_STATIONS"));

        expect(adjacent).toEqual([{ id: "Q42", kind: "STATION" }]);
    });

    it("reports a failed fetch as a transport error", async () => {
        const source = new FakeWikidata([item("L1")]);
        source.failRelations.add("L1");

        const expansion = collect(new RelationExpander(source).expand(entityRef("L1", "LINE"), "STATIONS_OF_LINE"));

        await expect(expansion).rejects.toBeInstanceOf(ExpansionError);
        await expect(expansion).rejects.toMatchObject({
            kind: "Transport",
            entityId: "L1",
            message: "STATIONS_OF_LINE of L1 failed",
        });
    });

    it("reports a missing entity as not found", async () => {
        const expansion = collect(
            new RelationExpander(new FakeWikidata()).expand(entityRef("X", "STATION"), "SYSTEMS_OF_ENTITY")
        );

        await expect(expansion).rejects.toMatchObject({ kind: "NotFound", entityId: "X" });
    });
});
