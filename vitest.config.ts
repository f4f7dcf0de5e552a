import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		// Unit tests sit beside their modules, end-to-end scenarios under src/__tests__
		include: ['src/**/*.test.ts'],
		// sql.js instantiates its WebAssembly module once per worker
		pool: 'forks',
	},
});
