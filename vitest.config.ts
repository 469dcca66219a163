import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			'@tunnelprobe/sdk': source('./packages/sdk/src/index.ts'),
			'@tunnelprobe/core': source('./packages/core/src/index.ts'),
			'@tunnelprobe/testing': source('./packages/testing/src/index.ts'),
			'@tunnelprobe/logger-file': source('./loggers/file/src/index.ts'),
			'@tunnelprobe/logger-console': source('./loggers/console/src/index.ts'),
		},
	},
	test: {
		globals: true,
		include: ['packages/*/src/**/*.test.ts', 'loggers/*/src/**/*.test.ts'],
		testTimeout: 20_000,
		pool: 'forks',
	},
});
