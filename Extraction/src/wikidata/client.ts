import fetch from "node-fetch";
import pRetry from "p-retry";
import { EntitiesResponse, RawEntity, normalizeEntityId, relationTargets } from "./schema.js";

const ENTITY_PROPS = "labels|descriptions|claims|sitelinks";

/**
 * What the crawl needs from the knowledge graph. Implemented by
 * {@link WikidataClient}; tests use an in-memory stand-in.
 */
export interface WikidataSource {
    fetchEntity(id: string): Promise<RawEntity>;
    fetchOutgoingRelations(id: string, property: string): Promise<string[]>;
}

export class EntityNotFoundError extends Error {
    constructor(readonly entityId: string) {
        super(`entity ${entityId} does not exist`);
        this.name = "EntityNotFoundError";
    }
}

export class WikidataRequestError extends Error {
    constructor(message: string, readonly status?: number) {
        super(message);
        this.name = "WikidataRequestError";
    }
}

export type FetchLike = (url: string, init: { headers: Record<string, string> }) => Promise<{
    ok: boolean;
    status: number;
    json(): Promise<unknown>;
}>;

export type WikidataClientOptions = {
    apiUrl: string;
    userAgent: string;
    requestDelayMs: number;
    retries: number;
    fetchImpl?: FetchLike;
    log?: (message: string) => void;
};

const sleep = (ms: number) => new Promise(res => setTimeout(res, ms));

export class WikidataClient implements WikidataSource {
    // One request per entity and run; a rejected request is forgotten so a later call may try again.
    private readonly entities = new Map<string, Promise<RawEntity>>();
    private readonly fetchImpl: FetchLike;

    constructor(private readonly options: WikidataClientOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    fetchEntity(id: string): Promise<RawEntity> {
        const normalized = normalizeEntityId(id);
        const pending = this.entities.get(normalized);
        if (pending) return pending;

        const request = this.request(normalized).catch((err: unknown) => {
            this.entities.delete(normalized);
            throw err;
        });
        this.entities.set(normalized, request);
        return request;
    }

    async fetchOutgoingRelations(id: string, property: string): Promise<string[]> {
        return relationTargets(await this.fetchEntity(id), property);
    }

    private async request(id: string): Promise<RawEntity> {
        const params = new URLSearchParams({
            action: "wbgetentities",
            format: "json",
            ids: id,
            props: ENTITY_PROPS,
        });
        const url = `${this.options.apiUrl}?${params.toString()}`;

        if (this.options.requestDelayMs > 0) await sleep(this.options.requestDelayMs); // be nice to the API

        const payload = await pRetry(
            async () => {
                const res = await this.fetchImpl(url, {
                    headers: {
                        "Accept": "application/json",
                        "User-Agent": this.options.userAgent,
                    },
                });
                if (!res.ok) throw new WikidataRequestError(`HTTP ${res.status} for ${id}`, res.status);
                return res.json();
            },
            {
                retries: this.options.retries,
                onFailedAttempt: err => {
                    this.options.log?.(
                        `[wikidata] ${id}: attempt ${err.attemptNumber} failed (${err.message}), ${err.retriesLeft} left`
                    );
                },
            }
        );

        const parsed = EntitiesResponse.safeParse(payload);
        if (!parsed.success) {
            const where = parsed.error.issues.map(issue => issue.path.join(".")).join(", ");
            throw new WikidataRequestError(`unexpected response shape for ${id} at ${where}`);
        }

        const { entities, error } = parsed.data;
        if (error) {
            if (error.code === "no-such-entity") throw new EntityNotFoundError(id);
            throw new WikidataRequestError(`${error.code} for ${id}${error.info ? `: ${error.info}` : ""}`);
        }

        // A redirected id comes back under its target's key.
        const values = Object.values(entities ?? {});
        const entity = entities?.[id] ?? (values.length === 1 ? values[0] : undefined);
        if (!entity || entity.missing !== undefined) throw new EntityNotFoundError(id);
        return entity;
    }
}
