import path from 'node:path';
import {fileURLToPath} from 'node:url';
import {defineConfig} from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{
				find: /^@cqlbridge\/([^/]+)\/(.*)$/,
				replacement: `${path.join(rootDir, 'packages')}/$1/$2`,
			},
		],
	},
	test: {
		include: ['packages/*/src/**/*.test.tsx'],
		environment: 'node',
		env: {
			LOG_LEVEL: 'silent',
		},
	},
});
