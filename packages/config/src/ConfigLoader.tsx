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

import {existsSync} from 'node:fs';
import {readFile} from 'node:fs/promises';
import {BRIDGE_CONFIG_KEYS, BridgeConfig, type BridgeConfigInput} from '@cqlbridge/config/src/BridgeConfig';
import {type ConfigObject, deepMerge, isConfigObject} from '@cqlbridge/config/src/config_loader/ConfigObjectMerge';
import {describeError} from '@cqlbridge/errors/src/BridgeError';
import {ConfigurationError} from '@cqlbridge/errors/src/domains/config/ConfigurationError';
import {Logger} from '@cqlbridge/logger/src/Logger';
import type {LoggerInterface} from '@cqlbridge/logger/src/LoggerInterface';

export const CONFIG_PATHS_ENV = 'CQLBRIDGE_CONFIG';

export interface LoadConfigOptions {
	logger?: LoggerInterface;
	overrides?: ConfigObject;
}

export function createBridgeConfig(
	input: BridgeConfigInput | ConfigObject = {},
	source = 'configuration',
): BridgeConfig {
	const result = BridgeConfig.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
		throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`, issues);
	}
	return Object.freeze(result.data);
}

function warnUnknownKeys(input: ConfigObject, source: string, logger: LoggerInterface): void {
	for (const key of Object.keys(input)) {
		if (!BRIDGE_CONFIG_KEYS.has(key)) {
			logger.warn({key, source}, `Ignoring unknown config key "${key}"`);
		}
	}
}

async function readConfigFile(configPath: string): Promise<ConfigObject> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(await readFile(configPath, 'utf8'));
	} catch (error) {
		throw new ConfigurationError(`Failed to read config file ${configPath}: ${describeError(error)}`, [], {
			cause: error,
		});
	}
	if (!isConfigObject(parsed)) {
		throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`);
	}
	return parsed;
}

export async function loadConfig(paths: ReadonlyArray<string>, options: LoadConfigOptions = {}): Promise<BridgeConfig> {
	const logger = (options.logger ?? Logger).child({module: 'config'});
	if (paths.length === 0) {
		throw new ConfigurationError(`${CONFIG_PATHS_ENV} must be set to at least one config file path`);
	}

	const configPath = paths.find((candidate) => existsSync(candidate));
	if (!configPath) {
		throw new ConfigurationError(`No config file found in: ${paths.join(', ')}`);
	}

	const fileConfig = deepMerge(await readConfigFile(configPath), options.overrides ?? {});
	warnUnknownKeys(fileConfig, configPath, logger);
	const config = createBridgeConfig(fileConfig, `config file ${configPath}`);
	logger.debug({path: configPath}, 'Loaded configuration');
	return config;
}

export function configPathsFromEnv(env: NodeJS.ProcessEnv = process.env): Array<string> {
	return (env[CONFIG_PATHS_ENV] ?? '')
		.split(',')
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
}

export async function loadConfigFromEnv(
	options: LoadConfigOptions & {env?: NodeJS.ProcessEnv} = {},
): Promise<BridgeConfig> {
	return loadConfig(configPathsFromEnv(options.env), options);
}
