import { defineConfig } from "vitest/config";


export default defineConfig({
    test: {
        include: ["test/**/*.test.ts"],
        setupFiles: ["./test/setup.ts"],
        environment: "node",
        pool: "forks",
        testTimeout: 30000,
        hookTimeout: 30000
    }
});
