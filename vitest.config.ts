import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
	test: {
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
		testTimeout: 10_000,
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**"],
		},
	},
	resolve: {
		alias: [
			{ find: "@fundflow/core/logger", replacement: pkg("core/src/logger/index.ts") },
			{ find: "@fundflow/core/db", replacement: pkg("core/src/db/index.ts") },
			{ find: "@fundflow/core/error", replacement: pkg("core/src/error/index.ts") },
			{ find: "@fundflow/core/utils", replacement: pkg("core/src/utils/index.ts") },
			{ find: /^@fundflow\/core$/, replacement: pkg("core/src/index.ts") },
			{ find: /^@fundflow\/memory-adapter$/, replacement: pkg("memory-adapter/src/index.ts") },
			{ find: /^@fundflow\/kysely-adapter$/, replacement: pkg("kysely-adapter/src/index.ts") },
			{ find: /^@fundflow\/test-utils$/, replacement: pkg("test-utils/src/index.ts") },
			{ find: "fundflow/db", replacement: pkg("fundflow/src/db/index.ts") },
			{ find: /^fundflow$/, replacement: pkg("fundflow/src/index.ts") },
		],
	},
});
