import { describe, expect, it, vi } from "vitest";
import {
    EntityNotFoundError,
    WikidataClient,
    WikidataRequestError,
    type FetchLike,
} from "../src/wikidata/client.js";

function respond(...bodies: { status?: number; body?: unknown }[]) {
    const fetchImpl = vi.fn<FetchLike>();
    for (const { status = 200, body = {} } of bodies) {
        fetchImpl.mockResolvedValueOnce({ ok: status < 400, status, json: async () => body });
    }
    return fetchImpl;
}

function client(fetchImpl: FetchLike, retries = 0, log?: (message: string) => void) {
    return new WikidataClient({
        apiUrl: "https://wikidata.test/w/api.php",
        userAgent: "test-agent",
        requestDelayMs: 0,
        retries,
        fetchImpl,
        log,
    });
}

const entity = (id: string) => ({
    id,
    labels: { en: { language: "en", value: "Alpha" } },
    descriptions: [],
    sitelinks: [],
    claims: {
        P81: [{
            mainsnak: {
                snaktype: "value",
                property: "P81",
                datavalue: { type: "wikibase-entityid", value: { "entity-type": "item", "numeric-id": 7 } },
            },
            rank: "normal",
        }],
    },
});

describe("WikidataClient", () => {
    it("requests one entity and parses it", async () => {
        const fetchImpl = respond({ body: { entities: { Q1: entity("Q1") } } });

        const fetched = await client(fetchImpl).fetchEntity("q1");

        expect(fetched.labels).toEqual({ en: { language: "en", value: "Alpha" } });
        expect(fetched.descriptions).toEqual({});
        const [url, init] = fetchImpl.mock.calls[0];
        expect(url).toBe(
            "https://wikidata.test/w/api.php?action=wbgetentities&format=json&ids=Q1&props=labels%7Cdescriptions%7Cclaims%7Csitelinks"
        );
        expect(init.headers["User-Agent"]).toBe("test-agent");
    });

    it("fetches an entity once per run", async () => {
        const fetchImpl = respond({ body: { entities: { Q1: entity("Q1") } } });
        const wikidata = client(fetchImpl);

        await wikidata.fetchEntity("Q1");
        const lines = await wikidata.fetchOutgoingRelations("Q1", "P81");

        expect(lines).toEqual(["Q7"]);
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it("follows a redirect", async () => {
        const fetchImpl = respond({ body: { entities: { Q2: entity("Q2") } } });

        const fetched = await client(fetchImpl).fetchEntity("Q1");

        expect(fetched.id).toBe("Q2");
    });

    it("throws EntityNotFoundError for unknown and missing ids", async () => {
        const fetchImpl = respond(
            { body: { error: { code: "no-such-entity", info: "Could not find an entity with the ID \"Q9\"." } } },
            { body: { entities: { Q8: { id: "Q8", missing: "" } } } },
        );
        const wikidata = client(fetchImpl);

        await expect(wikidata.fetchEntity("Q9")).rejects.toBeInstanceOf(EntityNotFoundError);
        await expect(wikidata.fetchEntity("Q8")).rejects.toBeInstanceOf(EntityNotFoundError);
    });

    it("reports other API errors", async () => {
        const fetchImpl = respond({ body: { error: { code: "maxlag", info: "Waiting for a database server" } } });

        await expect(client(fetchImpl).fetchEntity("Q1")).rejects.toThrow(
            new WikidataRequestError("maxlag for Q1: Waiting for a database server")
        );
    });

    it("reports an unexpected response shape", async () => {
        const fetchImpl = respond({ body: { entities: { Q1: { labels: {} } } } });

        await expect(client(fetchImpl).fetchEntity("Q1")).rejects.toThrow(
            "unexpected response shape for Q1 at entities.Q1.id"
        );
    });

    it("forgets a failed request", async () => {
        const log = vi.fn();
        const fetchImpl = respond({ status: 500 }, { body: { entities: { Q1: entity("Q1") } } });
        const wikidata = client(fetchImpl, 0, log);

        await expect(wikidata.fetchEntity("Q1")).rejects.toThrow("HTTP 500 for Q1");
        expect(log).toHaveBeenCalledWith("[wikidata] Q1: attempt 1 failed (HTTP 500 for Q1), 0 left");

        await expect(wikidata.fetchEntity("Q1")).resolves.toMatchObject({ id: "Q1" });
        expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it("retries a failed request", async () => {
        const fetchImpl = respond({ status: 503 }, { body: { entities: { Q1: entity("Q1") } } });

        const fetched = await client(fetchImpl, 1).fetchEntity("Q1");

        expect(fetched.id).toBe("Q1");
        expect(fetchImpl).toHaveBeenCalledTimes(2);
    });
});
