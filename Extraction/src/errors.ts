export abstract class HarvestError extends Error {
    abstract readonly kind: string;

    constructor(readonly entityId: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type ResolutionErrorKind = "NotFound" | "MalformedAttribute" | "Transport";

export class ResolutionError extends HarvestError {
    constructor(readonly kind: ResolutionErrorKind, entityId: string, message: string, options?: { cause?: unknown }) {
        super(entityId, message, options);
    }
}

export type ExpansionErrorKind = "Transport" | "NotFound";

export class ExpansionError extends HarvestError {
    constructor(readonly kind: ExpansionErrorKind, entityId: string, message: string, options?: { cause?: unknown }) {
        super(entityId, message, options);
    }
}

export class AssemblyError extends HarvestError {
    readonly kind = "EmptySystem";
}

export type SeedErrorKind = "SystemNotFound" | "StationNotFound";

export class SeedError extends HarvestError {
    constructor(readonly kind: SeedErrorKind, entityId: string, message: string, options?: { cause?: unknown }) {
        super(entityId, message, options);
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
