import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/__tests__/**/*.test.ts"],
        environment: "node",
        env: {
            APP_ENV: "test",
            LOG_LEVEL: "silent"
        },
        testTimeout: 10000
    }
});
