import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		// LanceDB suites write to temp directories
		testTimeout: 30_000,
		hookTimeout: 30_000,
		pool: 'forks',
	},
});
