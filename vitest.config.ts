import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packageEntry = (name: string): string => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			'@remap/mapper': packageEntry('mapper'),
			'@remap/logging': packageEntry('logging'),
			'@remap/config': packageEntry('config')
		}
	},
	test: {
		include: ['packages/*/__tests__/**/*.test.ts', '__tests__/**/*.test.ts'],
		setupFiles: ['./__tests__/setup.ts']
	}
});
