import type { EntityResolver } from "./entityResolver.js";
import { HarvestError, ResolutionError, SeedError, describeError, type SeedErrorKind } from "./errors.js";
import type { IdentifierAssigner } from "./identifierAssigner.js";
import { collect, type RelationExpander, type RelationKind } from "./relationExpander.js";
import type {
    ConnectionType,
    EntityRef,
    ResolvedAttributes,
    ResolvedLine,
    ResolvedStation,
    ResolvedSystem,
} from "./types.js";

export type Diagnostic = {
    severity: "warning" | "info";
    entityId: string;
    message: string;
};

export type CrawledSystem = {
    ref: EntityRef;
    localId: string;
    attributes: ResolvedSystem;
};

export type CrawledLine = {
    ref: EntityRef;
    localId: string;
    attributes: ResolvedLine;
};

export type PendingConnection = {
    targetId: string;       // external id, mapped to a local id at assembly
    type: ConnectionType;
};

export type CrawledStation = {
    ref: EntityRef;
    localId: string;
    lineLocalId: string;
    attributes: ResolvedStation;
    connections: PendingConnection[];
};

export type CrawlResult = {
    system: CrawledSystem;
    lines: CrawledLine[];
    stations: CrawledStation[];
    excluded: ReadonlySet<string>;  // external ids that failed after being discovered
    diagnostics: Diagnostic[];
};

export type CrawlOptions = {
    maxStations?: number;
    log?: (message: string) => void;
};

type FrontierTask =
    | { kind: "system"; ref: EntityRef }
    | { kind: "seed"; ref: EntityRef }
    | { kind: "line"; line: CrawledLine }
    | { kind: "station"; station: CrawledStation }
    | { kind: "adopt"; ref: EntityRef; fromSeed: boolean };

const CONNECTION_RELATIONS: [RelationKind, ConnectionType][] = [
    ["ADJACENT_STATIONS", "adjacent"],
    ["CONNECTING_STATIONS", "transfer"],
];

type VisitStatus = "admitted" | "rejected" | "failed";

class CrawlState {
    private readonly visited = new Map<string, VisitStatus>();
    private readonly lineById = new Map<string, CrawledLine>();
    readonly lines: CrawledLine[] = [];
    readonly stations: CrawledStation[] = [];
    readonly diagnostics: Diagnostic[] = [];
    readonly frontier: FrontierTask[] = [];
    limitReported = false;

    constructor(
        readonly system: CrawledSystem,
        readonly preResolved: ReadonlyMap<string, ResolvedStation>,
    ) {
        this.visited.set(system.ref.id, "admitted");
    }

    has(id: string): boolean {
        return this.visited.has(id);
    }

    // Taken before resolving, so whoever reaches the entity next sees the first claim.
    claim(id: string): void {
        this.visited.set(id, "admitted");
    }

    reject(id: string, message: string, severity: Diagnostic["severity"] = "info"): void {
        this.visited.set(id, "rejected");
        this.note(severity, id, message);
    }

    fail(id: string, err: unknown): void {
        this.visited.set(id, "failed");
        this.note("warning", id, describeError(err));
    }

    line(id: string): CrawledLine | undefined {
        return this.visited.get(id) === "admitted" ? this.lineById.get(id) : undefined;
    }

    addLine(line: CrawledLine): void {
        this.lineById.set(line.ref.id, line);
        this.lines.push(line);
    }

    addStation(station: CrawledStation): void {
        this.stations.push(station);
    }

    note(severity: Diagnostic["severity"], entityId: string, message: string): void {
        this.diagnostics.push({ severity, entityId, message });
    }

    excluded(): Set<string> {
        const ids = new Set<string>();
        for (const [id, status] of this.visited) {
            if (status === "failed") ids.add(id);
        }
        return ids;
    }
}

function taskEntity(task: FrontierTask): string {
    switch (task.kind) {
        case "line": return task.line.ref.id;
        case "station": return task.station.ref.id;
        default: return task.ref.id;
    }
}

/**
 * Breadth-first discovery of a transit system. Lines come from the system and
 * from the seed stations; stations come from their lines and, walking outward,
 * from their neighbors. Every entity is resolved at most once and the first
 * line to reach a station owns it.
 */
export class CrawlEngine {
    constructor(
        private readonly resolver: EntityResolver,
        private readonly expander: RelationExpander,
        private readonly assigner: IdentifierAssigner,
        private readonly options: CrawlOptions = {},
    ) {}

    async crawl(systemId: string, seedStationIds: string[]): Promise<CrawlResult> {
        const systemAttributes = await this.resolveSeed(
            () => this.resolver.resolveSystem(systemId), "SystemNotFound", systemId
        );
        const seeds = new Map<string, ResolvedStation>();
        for (const id of seedStationIds) {
            const seed = await this.resolveSeed(() => this.resolver.resolveStation(id), "StationNotFound", id);
            seeds.set(seed.ref.id, seed);
        }

        const system: CrawledSystem = {
            ref: systemAttributes.ref,
            localId: this.assigner.assignSystem(systemAttributes),
            attributes: systemAttributes,
        };
        const state = new CrawlState(system, seeds);
        this.report(state, systemAttributes);

        state.frontier.push({ kind: "system", ref: system.ref });
        for (const seed of seeds.values()) state.frontier.push({ kind: "seed", ref: seed.ref });

        for (let task = state.frontier.shift(); task; task = state.frontier.shift()) {
            try {
                await this.process(state, task);
            } catch (err) {
                if (!(err instanceof HarvestError)) throw err;
                state.fail(taskEntity(task), err);
            }
        }

        this.options.log?.(
            `[crawl] done: lines=${state.lines.length} stations=${state.stations.length} diagnostics=${state.diagnostics.length}`
        );

        return {
            system,
            lines: state.lines,
            stations: state.stations,
            excluded: state.excluded(),
            diagnostics: state.diagnostics,
        };
    }

    private async process(state: CrawlState, task: FrontierTask): Promise<void> {
        switch (task.kind) {
            case "system": {
                for (const ref of await collect(this.expander.expand(task.ref, "LINES_OF_SYSTEM"))) {
                    await this.admitLine(state, ref);
                }
                return;
            }
            case "seed": {
                for (const ref of await collect(this.expander.expand(task.ref, "LINES_OF_STATION"))) {
                    await this.admitLine(state, ref);
                }
                // the seed may not be listed by any of its lines
                state.frontier.push({ kind: "adopt", ref: task.ref, fromSeed: true });
                return;
            }
            case "line": {
                const refs = await collect(this.expander.expand(task.line.ref, "STATIONS_OF_LINE"));
                for (const ref of refs) await this.admitStation(state, ref, task.line);
                this.options.log?.(`[crawl] line ${task.line.localId}: ${refs.length} stations listed`);
                return;
            }
            case "station": {
                const { station } = task;
                for (const [relation, type] of CONNECTION_RELATIONS) {
                    for await (const target of this.expander.expand(station.ref, relation)) {
                        if (target.id === station.ref.id) continue;
                        station.connections.push({ targetId: target.id, type });
                        if (!state.has(target.id)) state.frontier.push({ kind: "adopt", ref: target, fromSeed: false });
                    }
                }
                return;
            }
            case "adopt":
                return this.adopt(state, task.ref, task.fromSeed);
        }
    }

    private async admitLine(state: CrawlState, ref: EntityRef): Promise<CrawledLine | undefined> {
        const known = state.line(ref.id);
        if (known) return known;
        if (state.has(ref.id)) return undefined;

        state.claim(ref.id);
        let attributes: ResolvedLine;
        try {
            attributes = await this.resolver.resolveLine(ref.id);
        } catch (err) {
            if (!(err instanceof ResolutionError)) throw err;
            state.fail(ref.id, err);
            return undefined;
        }
        this.report(state, attributes);

        const line: CrawledLine = {
            ref: attributes.ref,
            localId: this.assigner.assignLine(attributes),
            attributes,
        };
        state.addLine(line);
        state.frontier.push({ kind: "line", line });
        this.options.log?.(`[crawl] line ${line.localId} (${ref.id})`);
        return line;
    }

    private async admitStation(state: CrawlState, ref: EntityRef, line: CrawledLine): Promise<void> {
        if (state.has(ref.id)) return;

        const max = this.options.maxStations;
        if (max !== undefined && state.stations.length >= max) {
            if (!state.limitReported) {
                state.limitReported = true;
                state.note("info", ref.id, `station limit of ${max} reached, skipping ${ref.id} and later stations`);
            }
            return;
        }

        state.claim(ref.id);
        let attributes: ResolvedStation;
        try {
            attributes = state.preResolved.get(ref.id) ?? await this.resolver.resolveStation(ref.id);
        } catch (err) {
            if (!(err instanceof ResolutionError)) throw err;
            state.fail(ref.id, err);
            return;
        }
        this.report(state, attributes);

        const station: CrawledStation = {
            ref: attributes.ref,
            localId: this.assigner.assignStation(attributes, line.localId),
            lineLocalId: line.localId,
            attributes,
            connections: [],
        };
        state.addStation(station);
        state.frontier.push({ kind: "station", station });
    }

    /**
     * Admit a station reached without a line listing it. Its owner is the first
     * of its lines already in the crawl; a neighbor may also bring in a new line
     * when that line, or the station itself, belongs to the system.
     */
    private async adopt(state: CrawlState, ref: EntityRef, fromSeed: boolean): Promise<void> {
        if (state.has(ref.id)) return;

        const lines = await collect(this.expander.expand(ref, "LINES_OF_STATION"));
        let owner: CrawledLine | undefined;
        for (const line of lines) {
            owner = state.line(line.id);
            if (owner) break;
        }
        if (!owner && !fromSeed) owner = await this.adoptLine(state, ref, lines);

        if (!owner) {
            if (fromSeed) {
                const seed = state.preResolved.get(ref.id);
                if (seed) this.report(state, seed);
                state.reject(ref.id, "seed station has no line in this crawl", "warning");
            } else {
                state.reject(ref.id, "not on a line of this system");
            }
            return;
        }
        await this.admitStation(state, ref, owner);
    }

    private async adoptLine(state: CrawlState, station: EntityRef, lines: EntityRef[]): Promise<CrawledLine | undefined> {
        const vouched = await this.belongsToSystem(state, station);
        for (const line of lines) {
            if (state.has(line.id)) continue;
            if (vouched || await this.belongsToSystem(state, line)) {
                const admitted = await this.admitLine(state, line);
                if (admitted) return admitted;
            }
        }
        return undefined;
    }

    private async belongsToSystem(state: CrawlState, ref: EntityRef): Promise<boolean> {
        for await (const system of this.expander.expand(ref, "SYSTEMS_OF_ENTITY")) {
            if (system.id === state.system.ref.id) return true;
        }
        return false;
    }

    private async resolveSeed<T>(resolve: () => Promise<T>, kind: SeedErrorKind, id: string): Promise<T> {
        try {
            return await resolve();
        } catch (err) {
            if (!(err instanceof ResolutionError)) throw err;
            const what = kind === "SystemNotFound" ? "system" : "station";
            throw new SeedError(kind, id, `${what} seed ${id} could not be resolved: ${err.message}`, { cause: err });
        }
    }

    private report(state: CrawlState, attributes: ResolvedAttributes): void {
        for (const issue of attributes.issues) state.note("warning", issue.entityId, issue.message);
    }
}
