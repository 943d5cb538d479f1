import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['packages/*/src/**/*.test.ts', 'pipeline/**/*.test.ts', 'server/**/*.test.ts'],
		environment: 'node'
	}
});
