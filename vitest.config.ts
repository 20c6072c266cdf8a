import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		// Type tests (*.test-d.ts) are run as well as checked, so a typo in an expected type fails instead of passing silently
		include: [...configDefaults.include, ...configDefaults.typecheck.include],
		typecheck: {
			enabled: true,
		},
	},
});
