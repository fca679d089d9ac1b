/*
 * Copyright (C) 2026 Fluxer Contributors
 *
 * This file is part of Fluxer.
 *
 * Fluxer is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * Fluxer is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with Fluxer. If not, see <https://www.gnu.org/licenses/>.
 */

import {mkdtempSync, rmSync, writeFileSync} from 'node:fs';
import {tmpdir} from 'node:os';
import path from 'node:path';
import {
	configPathsFromEnv,
	createBridgeConfig,
	loadConfig,
	loadConfigFromEnv,
} from '@cqlbridge/config/src/ConfigLoader';
import {type ConfigObject, deepMerge} from '@cqlbridge/config/src/config_loader/ConfigObjectMerge';
import {ConfigurationError} from '@cqlbridge/errors/src/domains/config/ConfigurationError';
import {createMockLogger} from '@cqlbridge/logger/src/test/mocks/MockLogger';
import {afterEach, describe, expect, test} from 'vitest';

function createTempConfig(config: ConfigObject): string {
	const dir = mkdtempSync(path.join(tmpdir(), 'cqlbridge-config-test-'));
	const configPath = path.join(dir, 'config.json');
	writeFileSync(configPath, JSON.stringify(config));
	return configPath;
}

describe('ConfigLoader', () => {
	let tempPaths: Array<string> = [];

	afterEach(() => {
		for (const p of tempPaths) {
			rmSync(path.dirname(p), {recursive: true, force: true});
		}
		tempPaths = [];
	});

	test('loadConfig applies defaults to the file contents', async () => {
		const configPath = createTempConfig({hosts: ['10.0.0.1', '10.0.0.2'], keyspace: 'shop'});
		tempPaths.push(configPath);

		const config = await loadConfig([configPath], {logger: createMockLogger()});
		expect(config.hosts).toEqual(['10.0.0.1', '10.0.0.2']);
		expect(config.keyspace).toBe('shop');
		expect(config.port).toBe(9042);
		expect(config.allowFiltering).toBe(true);
		expect(config.replicationFactor).toBe(1);
		expect(config.timestampZone).toBe('local');
		expect(Object.isFrozen(config)).toBe(true);
	});

	test('uses the first path that exists', async () => {
		const configPath = createTempConfig({keyspace: 'second'});
		tempPaths.push(configPath);

		const config = await loadConfig(['/nonexistent/config.json', configPath], {logger: createMockLogger()});
		expect(config.keyspace).toBe('second');
	});

	test('throws when no config file is found', async () => {
		await expect(loadConfig(['/nonexistent/path.json'])).rejects.toThrow('No config file found');
	});

	test('throws when config paths array is empty', async () => {
		await expect(loadConfig([])).rejects.toThrow('CQLBRIDGE_CONFIG must be set');
	});

	test('rejects invalid values', async () => {
		const configPath = createTempConfig({port: 70000});
		tempPaths.push(configPath);

		await expect(loadConfig([configPath], {logger: createMockLogger()})).rejects.toBeInstanceOf(ConfigurationError);
	});

	test('rejects files that are not JSON objects', async () => {
		const dir = mkdtempSync(path.join(tmpdir(), 'cqlbridge-config-test-'));
		const configPath = path.join(dir, 'config.json');
		writeFileSync(configPath, '[1, 2]');
		tempPaths.push(configPath);

		await expect(loadConfig([configPath])).rejects.toThrow('must contain a JSON object');
	});

	test('allows unknown properties (but warns)', async () => {
		const logger = createMockLogger();
		const configPath = createTempConfig({keyspace: 'shop', extra_root: true});
		tempPaths.push(configPath);

		await expect(loadConfig([configPath], {logger})).resolves.toBeDefined();
		expect(logger.warn).toHaveBeenCalledWith(
			{key: 'extra_root', source: configPath},
			'Ignoring unknown config key "extra_root"',
		);
	});

	test('merges overrides over the file', async () => {
		const configPath = createTempConfig({keyspace: 'shop', verbose: false});
		tempPaths.push(configPath);

		const config = await loadConfig([configPath], {logger: createMockLogger(), overrides: {verbose: true}});
		expect(config.keyspace).toBe('shop');
		expect(config.verbose).toBe(true);
	});

	test('reads the path list from the environment', async () => {
		const configPath = createTempConfig({keyspace: 'from_env'});
		tempPaths.push(configPath);

		const env = {CQLBRIDGE_CONFIG: ` /nonexistent/a.json , ,${configPath}`};
		expect(configPathsFromEnv(env)).toEqual(['/nonexistent/a.json', configPath]);

		const config = await loadConfigFromEnv({env, logger: createMockLogger()});
		expect(config.keyspace).toBe('from_env');
	});

	test('createBridgeConfig builds a frozen default config', () => {
		const config = createBridgeConfig();
		expect(config.hosts).toEqual(['127.0.0.1']);
		expect(config.keyspace).toBe('cqlbridge');
		expect(config.strictDecoding).toBe(false);
		expect(Object.isFrozen(config)).toBe(true);
	});
});

describe('deepMerge', () => {
	test('merges nested objects and replaces arrays', () => {
		const base: ConfigObject = {hosts: ['a'], nested: {x: 1, y: 2}};
		expect(deepMerge(base, {hosts: ['b', 'c'], nested: {y: 3}})).toEqual({hosts: ['b', 'c'], nested: {x: 1, y: 3}});
		expect(base).toEqual({hosts: ['a'], nested: {x: 1, y: 2}});
	});
});
