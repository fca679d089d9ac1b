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

import type {BridgeConfig} from '@cqlbridge/config/src/BridgeConfig';
import {createBridgeConfig} from '@cqlbridge/config/src/ConfigLoader';
import {MAX_PORT, MIN_PORT} from '@cqlbridge/constants/src/BridgeConstants';
import {ConfigurationError} from '@cqlbridge/errors/src/domains/config/ConfigurationError';

export interface ConnectionParams {
	hosts?: Array<string>;
	keyspace?: string;
	table?: string;
	port?: number;
	verbose?: boolean;
}

const TRUTHY_FLAGS = new Set(['true', '1', 'yes']);

function parsePort(value: string): number {
	const port = /^\d+$/.test(value) ? Number(value) : Number.NaN;
	if (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
		throw new ConfigurationError(`Invalid port "${value}": expected an integer between ${MIN_PORT} and ${MAX_PORT}`);
	}
	return port;
}

/**
 * Parses `key=value` pairs separated by `;`, e.g.
 * `hosts=10.0.0.1,10.0.0.2;keyspace=shop;port=9042;verbose=yes`.
 * Tokens without `=` and unknown keys are ignored.
 */
export function parseConnectionParams(text: string): ConnectionParams {
	const params: ConnectionParams = {};

	for (const token of text.split(';')) {
		const separator = token.indexOf('=');
		if (separator === -1) continue;

		const key = token.slice(0, separator).trim();
		const value = token.slice(separator + 1).trim();
		switch (key) {
			case 'hosts':
				params.hosts = value
					.split(',')
					.map((host) => host.trim())
					.filter((host) => host.length > 0);
				break;
			case 'keyspace':
				params.keyspace = value;
				break;
			case 'table':
				params.table = value;
				break;
			case 'port':
				params.port = parsePort(value);
				break;
			case 'verbose':
				params.verbose = TRUTHY_FLAGS.has(value.toLowerCase());
				break;
			default:
				break;
		}
	}

	return params;
}

export function applyConnectionParams(config: BridgeConfig, params: ConnectionParams): BridgeConfig {
	const overrides: ConnectionParams = {};
	if (params.hosts && params.hosts.length > 0) overrides.hosts = params.hosts;
	if (params.keyspace) overrides.keyspace = params.keyspace;
	if (params.table) overrides.table = params.table;
	if (params.port !== undefined) overrides.port = params.port;
	if (params.verbose !== undefined) overrides.verbose = params.verbose;
	return createBridgeConfig({...config, ...overrides}, 'connection parameters');
}
