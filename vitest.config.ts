import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["Extraction/tests/**/*.test.ts"],
        environment: "node",
    },
});
