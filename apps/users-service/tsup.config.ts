import { defineConfig } from 'tsup';

export default defineConfig({
	entry: ['src/main.ts'],
	format: ['esm'],
	platform: 'node',
	dts: false,
	clean: true,
	sourcemap: true,
	target: 'node20',
	// Workspace packages export TypeScript sources, which Node cannot load
	noExternal: [/^@quarry\//],
	external: [
		// Native addons, worker-thread loaders and WASM cannot be bundled by esbuild
		'pino',
		'pino-pretty',
		'argon2',
		'@electric-sql/pglite',
		'postgres',
	],
});
