import {fileURLToPath} from 'node:url';
import {defineConfig} from 'vitest/config';

export default defineConfig({
	resolve: {
		alias: {
			'@platewatch': fileURLToPath(new URL('./packages', import.meta.url)),
		},
	},
	test: {
		globals: false,
		environment: 'node',
		include: ['packages/*/src/**/*.test.tsx'],
		setupFiles: ['packages/api/src/test/setup.tsx'],
		testTimeout: 10000,
	},
});
