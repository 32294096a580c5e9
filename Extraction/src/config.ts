import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
    WIKIDATA_API_URL: z.string().url().default("https://www.wikidata.org/w/api.php"),
    // Wikidata wants a descriptive client name. Change this to something sane.
    WIKIDATA_USER_AGENT: z.string().min(1).default("transit-graph-harvester/0.1"),
    HARVEST_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(150),
    HARVEST_RETRIES: z.coerce.number().int().nonnegative().default(2),
    HARVEST_OUT_DIR: z.string().min(1).default("out"),
    // comma-separated, e.g. "ru,uk"
    HARVEST_LANGUAGES: z.string().default(""),
    HARVEST_ID_STRATEGY: z.enum(["entity", "name"]).default("entity"),
});

export type HarvestConfig = {
    apiUrl: string;
    userAgent: string;
    requestDelayMs: number;
    retries: number;
    outDir: string;
    languages: string[];
    idStrategy: "entity" | "name";
};

export function splitList(value: string): string[] {
    return value.split(",").map(part => part.trim()).filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvestConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`Invalid environment variables: ${problems.join("; ")}`);
    }

    const values = parsed.data;
    return {
        apiUrl: values.WIKIDATA_API_URL,
        userAgent: values.WIKIDATA_USER_AGENT,
        requestDelayMs: values.HARVEST_REQUEST_DELAY_MS,
        retries: values.HARVEST_RETRIES,
        outDir: values.HARVEST_OUT_DIR,
        languages: splitList(values.HARVEST_LANGUAGES),
        idStrategy: values.HARVEST_ID_STRATEGY,
    };
}
