import { fileURLToPath } from "node:url"

import { defineConfig } from "vitest/config"

export default defineConfig({
	resolve: {
		alias: {
			"@mender/types": fileURLToPath(new URL("./packages/types/src/index.ts", import.meta.url)),
		},
	},
	test: {
		include: ["src/**/__tests__/**/*.spec.ts", "packages/*/src/**/__tests__/**/*.spec.ts"],
		environment: "node",
		watch: false,
	},
})
