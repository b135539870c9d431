import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**"],
		},
	},
	resolve: {
		alias: {
			"@clearline/core/db": pkg("core/src/db/index.ts"),
			"@clearline/core/error": pkg("core/src/error/index.ts"),
			"@clearline/core/http": pkg("core/src/http/index.ts"),
			"@clearline/core/logger": pkg("core/src/logger/index.ts"),
			"@clearline/core/utils": pkg("core/src/utils/index.ts"),
			"@clearline/core": pkg("core/src/index.ts"),
			"@clearline/memory-adapter": pkg("memory-adapter/src/index.ts"),
			"@clearline/drizzle-adapter": pkg("drizzle-adapter/src/index.ts"),
			"@clearline/client": pkg("client/src/index.ts"),
			"@clearline/registry": pkg("registry/src/index.ts"),
			"@clearline/bank": pkg("bank/src/index.ts"),
			"@clearline/test-utils": pkg("test-utils/src/index.ts"),
		},
	},
});
