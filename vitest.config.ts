import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.{ts,tsx}'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		globals: true,
		setupFiles: ['source/test-setup.ts'],
		// Grammar loading (WASM) can be slow on a cold cache.
		testTimeout: 30_000,
		hookTimeout: 30_000,
	},
});
