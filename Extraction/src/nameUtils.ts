import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { StationStatus } from "./types.js";

const RULES_PATH = fileURLToPath(new URL("../data/nameRules.json", import.meta.url));

const NameRules = z.object({
    stationPatterns: z.record(z.array(z.string())),
    linePatterns: z.record(z.array(z.string())),
    separators: z.string(),
    transliteration: z.record(z.string()),
    folding: z.record(z.string()),
    statusPatterns: z.record(z.record(z.enum(["planned", "under_construction", "closed"]))),
});

const rules = NameRules.parse(JSON.parse(fs.readFileSync(RULES_PATH, "utf8")));

function compile(patterns: Record<string, string[]>): Map<string, RegExp[]> {
    return new Map(
        Object.entries(patterns).map(([language, list]) => [language, list.map(p => new RegExp(p))] as const)
    );
}

const stationPatterns = compile(rules.stationPatterns);
const linePatterns = compile(rules.linePatterns);

// char -> replacement, built once from the folding groups
const replacements = new Map<string, string>(Object.entries(rules.transliteration));
for (const [replacement, chars] of Object.entries(rules.folding)) {
    for (const c of chars) {
        if (!replacements.has(c)) replacements.set(c, replacement);
    }
}
const separators = new Set(rules.separators);

function extract(name: string, patterns: RegExp[] | undefined): string {
    for (const pattern of patterns ?? []) {
        const captured = pattern.exec(name)?.groups?.name;
        if (captured !== undefined) return captured;
    }
    return name;
}

/**
 * Strip the specifiers Wikidata labels carry around a station name, e.g.
 * "Kropotkinskaya metro station" gives "Kropotkinskaya".
 */
export function extractStationName(name: string, language: string): string {
    return extract(name.replaceAll("&", "and"), stationPatterns.get(language));
}

/** "Sokolnicheskaya line" gives "Sokolnicheskaya". */
export function extractLineName(name: string, language: string): string {
    return extract(name, linePatterns.get(language));
}

/**
 * Lowercase ASCII identifier: separators collapse to one "_", Cyrillic is
 * transliterated and diacritics folded.
 */
export function escapeId(text: string): string {
    let escaped = "";
    let special = false;
    for (const c of text.toLowerCase()) {
        if (separators.has(c)) {
            if (!special) escaped += "_";
            special = true;
            continue;
        }
        special = false;
        escaped += replacements.get(c) ?? c;
    }
    return escaped.replace(/_{2,}/g, "_").replace(/^_+|_+$/g, "");
}

/** Name in the first available of: English, the local languages, any other in sorted order. */
export function preferredName(names: Record<string, string>, languages: string[] = []): [string, string] | undefined {
    for (const language of ["en", ...languages, ...Object.keys(names).sort()]) {
        const name = names[language];
        if (name) return [language, name];
    }
    return undefined;
}

export function statusFromDescriptions(descriptions: Record<string, string>): StationStatus | undefined {
    for (const [language, patterns] of Object.entries(rules.statusPatterns)) {
        const description = descriptions[language]?.toLowerCase();
        if (!description) continue;
        for (const [pattern, status] of Object.entries(patterns)) {
            if (description.includes(pattern)) return status;
        }
    }
    return undefined;
}
