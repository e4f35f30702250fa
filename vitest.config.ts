import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
	resolve: {
		// Tests run against the core sources; the package export points at its build.
		alias: {
			'@courtgate/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
		},
	},
	test: {
		globals: false,
		environment: 'node',
		include: ['packages/*/src/**/__tests__/**/*.test.ts'],
	},
});
