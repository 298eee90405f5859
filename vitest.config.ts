import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));
const sharedSrc = `${root}packages/shared/src`;
const serverSrc = `${root}packages/server/src`;
const typesSrc = `${root}packages/types/src`;

export default defineConfig({
	resolve: {
		alias: [
			// Order matters: more specific (subpath) before less specific (bare import).
			{ find: /^@policy-audit\/server\/(.+)$/, replacement: `${serverSrc}/$1` },
			{ find: /^@policy-audit\/server$/, replacement: `${serverSrc}/index.ts` },

			{ find: /^@policy-audit\/types\/(.+)$/, replacement: `${typesSrc}/$1` },
			{ find: /^@policy-audit\/types$/, replacement: `${typesSrc}/index.ts` },

			{ find: /^@policy-audit\/shared\/(.+)$/, replacement: `${sharedSrc}/$1` },
			{ find: /^@policy-audit\/shared$/, replacement: `${sharedSrc}/index.ts` }
		]
	},
	test: {
		include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
		env: {
			LOG_LEVEL: 'silent',
			NODE_ENV: 'test'
		}
	}
});
