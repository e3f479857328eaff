import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		setupFiles: ["src/test/msw-setup.ts"],
		environment: "node"
	}
});
